/**
 * Type: DecodableFormat
 * Description: 서버 응답에서 디코딩할 수 있는 이미지 포맷입니다.
 */
export type DecodableFormat = 'png' | 'gif' | 'jpeg';

/**
 * Type: OutputFormat
 * Description: 저장 또는 전송 시 사용할 수 있는 이미지 포맷입니다.
 */
export type OutputFormat = 'png' | 'gif' | 'jpeg';

/**
 * Interface: ImageResponse
 * Description: 지도 이미지 요청의 원본 응답을 나타냅니다.
 */
export interface ImageResponse {
  /** 응답 본문 */
  data: Buffer;
  /** 응답 Content-Type 헤더 (없을 수 있음) */
  contentType?: string;
}

/**
 * Interface: MapImage
 * Description: 디코딩에 성공한 지도 이미지를 나타냅니다.
 */
export interface MapImage {
  /** 이미지 바이너리 */
  data: Buffer;
  /** 응답 MIME 타입 (예: image/png) */
  mimeType: string;
  format: DecodableFormat;
  /** 가로 픽셀 */
  width: number;
  /** 세로 픽셀 */
  height: number;
}

/**
 * Interface: ImageRequestOptions
 * Description: 이미지 요청 시 사용하는 옵션입니다.
 */
export interface ImageRequestOptions {
  /** 요청 취소용 signal */
  signal?: AbortSignal;
}
