import type { ServerResponse } from 'http';
import sharp, { type OutputInfo, type Sharp } from 'sharp';
import { InvalidArgumentError, PreconditionError, RemoteResponseError } from '../../errors/MapImageError';
import { CONFIG, StaticMapOptions } from '../../interfaces/config/Config';
import { DecodableFormat, ImageRequestOptions, MapImage, OutputFormat } from '../../interfaces/image/MapImage';
import {
  createDefaultParameters,
  ImageFormat,
  MapType,
  PARAMETER_GROUPS,
  StaticMapParameters,
} from '../../interfaces/map/MapParameters';
import { ImageFetcher } from '../../services/fetch/ImageFetcher';
import { ImageCodec } from '../../services/image/ImageCodec';
import { buildQueryString } from '../../util/buildQueryString';

const DECODERS: Partial<Record<string, DecodableFormat>> = {
  'image/png': 'png',
  'image/gif': 'gif',
  'image/jpeg': 'jpeg',
};

/**
 * 클래스: MapImageRequestBuilder
 * 설명: Static Maps API 요청 URL 을 만들고 지도 이미지를 가져오는 빌더 클래스입니다.
 * 하나의 인스턴스는 하나의 지도 이미지 요청을 나타냅니다.
 *
 * @example
 * const url = new MapImageRequestBuilder('Prague')
 *   .setZoom(12)
 *   .setMarker('color:red|Prague')
 *   .getUrl();
 */
export class MapImageRequestBuilder {
  private parameters: StaticMapParameters = createDefaultParameters();
  private options: StaticMapOptions = {};
  private fetcher = new ImageFetcher();
  private codec = new ImageCodec();

  /**
   * @param location - 지도 중심 (선택 사항)
   */
  constructor(location?: string) {
    if (arguments.length > 1) {
      throw new InvalidArgumentError('MapImageRequestBuilder accepts at most one argument');
    }
    if (location !== undefined && location !== null) {
      this.setLocation(location);
    }
  }

  /** HTTP 옵션 설정 (baseURL, timeout, headers, adapter) */
  setOptions(options: StaticMapOptions): this {
    this.options = { ...options };
    this.fetcher = new ImageFetcher(this.options);
    return this;
  }

  /** 지도 중심 설정 (좌표 "lat,lng" 또는 주소) */
  setLocation(location: string): this {
    this.parameters.location.center = location;
    return this;
  }

  /** 확대 수준 설정 (소수점 이하는 버림) */
  setZoom(zoom: number | string): this {
    const value = Number(zoom);
    const truncated = Math.trunc(value);
    if ((typeof zoom === 'string' && zoom.trim() === '') || !Number.isSafeInteger(truncated)) {
      throw new InvalidArgumentError(`invalid zoom: ${zoom}`);
    }
    this.parameters.location.zoom = truncated;
    return this;
  }

  /** 이미지 크기 설정 ({가로}x{세로}) */
  setSize(size: string): this {
    this.parameters.map.size = size;
    return this;
  }

  /** 이미지 포맷 설정, 기본값: png */
  setFormat(format: ImageFormat): this {
    this.parameters.map.format = format;
    return this;
  }

  /** 지도 종류 설정, 기본값: roadmap */
  setMapType(maptype: MapType): this {
    this.parameters.map.maptype = maptype;
    return this;
  }

  /** 라벨 언어 설정 (선택 사항) */
  setLanguage(language?: string | null): this {
    this.parameters.map.language = language ?? null;
    return this;
  }

  /** 지역 코드 설정 (선택 사항, ccTLD 2자) */
  setRegion(region?: string | null): this {
    this.parameters.map.region = region ?? null;
    return this;
  }

  /** 마커 정의 추가 (기존 마커는 유지) */
  setMarker(marker: string): this {
    this.parameters.feature.markers.push(marker);
    return this;
  }

  /** 경로 설정 (선택 사항) */
  setPath(path?: string | null): this {
    this.parameters.feature.path = path ?? null;
    return this;
  }

  /** 표시 영역에 포함할 위치 설정 (선택 사항) */
  setVisible(visible?: string | null): this {
    this.parameters.feature.visible = visible ?? null;
    return this;
  }

  /** 스타일 규칙 추가 (기존 스타일은 유지) */
  setStyle(style: string): this {
    this.parameters.feature.style.push(style);
    return this;
  }

  /** 위치 센서 사용 여부 설정, 기본값: false */
  setSensor(sensor: boolean): this {
    this.parameters.reporting.sensor = sensor;
    return this;
  }

  /**
   * Method: buildQueryString
   * Description: 모든 파라미터 그룹을 하나의 쿼리 문자열로 직렬화합니다.
   * @returns '?' 없는 쿼리 문자열
   */
  buildQueryString(): string {
    return buildQueryString(PARAMETER_GROUPS.map((group) => this.parameters[group]));
  }

  /**
   * Method: getUrl
   * Description: 지도 이미지 요청 URL 을 반환합니다.
   * @returns
   */
  getUrl(): string {
    this.assertLocation();
    const url = new URL(this.options.baseURL ?? CONFIG.BASE_URL);
    // baseURL 에 이미 있는 쿼리는 유지
    for (const [key, value] of new URLSearchParams(this.buildQueryString())) {
      url.searchParams.append(key, value);
    }
    return url.toString();
  }

  /**
   * Method: getImageBytes
   * Description: 지도 이미지를 요청하고 Content-Type 에 맞는 디코더로 검증합니다.
   * @param options - signal
   * @returns
   */
  async getImageBytes(options: ImageRequestOptions = {}): Promise<MapImage> {
    const url = this.getUrl();
    const response = await this.fetcher.fetch(url, options);
    const mimeType = response.contentType?.split(';')[0].trim().toLowerCase() ?? '';

    if (response.data.length === 0 || !mimeType.startsWith('image/')) {
      throw new RemoteResponseError('not an image', response.contentType);
    }

    const format = DECODERS[mimeType];
    if (format === undefined) {
      throw new RemoteResponseError(`unsupported format: ${mimeType}`, mimeType);
    }

    return this.codec.decode(response.data, mimeType, format);
  }

  /**
   * Method: getImage
   * Description: 지도 이미지를 sharp 객체로 반환합니다.
   * @param options - signal
   * @returns
   */
  async getImage(options: ImageRequestOptions = {}): Promise<Sharp> {
    const image = await this.getImageBytes(options);
    return sharp(image.data);
  }

  /**
   * Method: save
   * Description: 지도 이미지를 파일로 저장합니다.
   * @param destination - 저장 경로
   * @param quality - 0..100. jpeg 는 화질, png 는 무손실 압축 수준(0..9)으로 환산
   * @param format - 저장 포맷 (없으면 확장자 기준)
   * @returns
   */
  async save(destination: string, quality?: number, format?: OutputFormat): Promise<OutputInfo> {
    const image = await this.getImageBytes();
    return this.codec.save(image, destination, quality, format);
  }

  /**
   * Method: send
   * Description: 지도 이미지를 HTTP 응답 본문으로 전송합니다.
   * @param response - HTTP 응답
   * @param format - 출력 포맷, 기본값: jpeg
   * @param quality - 0..100. jpeg 는 화질, png 는 무손실 압축 수준(0..9)으로 환산
   */
  async send(response: ServerResponse, format: OutputFormat = 'jpeg', quality?: number): Promise<void> {
    const image = await this.getImageBytes();
    const body = await this.codec.encode(image, format, quality);

    response.setHeader('Content-Type', this.codec.mimeTypeOf(format));
    response.setHeader('Content-Length', body.length);
    response.end(body);
  }

  private assertLocation(): void {
    if (this.parameters.location.center === null) {
      throw new PreconditionError('missing location');
    }
  }
}
