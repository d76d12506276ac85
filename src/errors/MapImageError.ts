/**
 * Class: MapImageError
 * Description: 지도 이미지 SDK에서 발생하는 모든 오류의 기본 클래스입니다.
 */
export class MapImageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MapImageError';
  }
}

/**
 * Class: InvalidArgumentError
 * Description: 생성자 또는 setter에 잘못된 인자가 전달된 경우 발생합니다.
 */
export class InvalidArgumentError extends MapImageError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Class: PreconditionError
 * Description: 필수 파라미터(center)가 설정되지 않은 상태로 요청을 만들 때 발생합니다.
 */
export class PreconditionError extends MapImageError {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

/**
 * Class: RemoteResponseError
 * Description: 서버 응답이 이미지가 아니거나 지원하지 않는 MIME 타입인 경우 발생합니다.
 */
export class RemoteResponseError extends MapImageError {
  constructor(message: string, public readonly contentType?: string) {
    super(message);
    this.name = 'RemoteResponseError';
  }
}

/**
 * Class: DecodeError
 * Description: MIME 타입은 지원하지만 이미지 디코딩에 실패한 경우 발생합니다.
 */
export class DecodeError extends MapImageError {
  constructor(message: string, public readonly reason?: unknown) {
    super(message);
    this.name = 'DecodeError';
  }
}
