import axios, { type AxiosInstance } from 'axios';
import { CONFIG, StaticMapOptions } from '../../interfaces/config/Config';
import { ImageRequestOptions, ImageResponse } from '../../interfaces/image/MapImage';

/**
 * Class: ImageFetcher
 * Description: 지도 이미지 URL 의 바이너리와 Content-Type 을 가져옵니다.
 */
export class ImageFetcher {
  private client: AxiosInstance;

  /**
   * Constructor: ImageFetcher
   * Description: 요청 옵션으로 Axios client 를 초기화 합니다.
   * @param options - timeout, headers, adapter
   */
  constructor(options: StaticMapOptions = {}) {
    this.client = axios.create({
      timeout: options.timeout ?? CONFIG.TIMEOUT,
      adapter: options.adapter,
      headers: {
        'Accept': 'image/*',
        ...options.headers,
      },
    });
  }

  /**
   * Method: fetch
   * Description: 지정한 URL 로 GET 요청을 보내 응답 본문을 그대로 반환합니다.
   * @param url - 전체 요청 URL
   * @param options - signal
   * @returns
   */
  public async fetch(url: string, options: ImageRequestOptions = {}): Promise<ImageResponse> {
    try {
      const response = await this.client.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        signal: options.signal,
      });
      const contentType = response.headers['content-type'];

      return {
        data: Buffer.from(response.data),
        contentType: typeof contentType === 'string' ? contentType : undefined,
      };
    } catch (error) {
      this.handleError(error);
      throw error;
    }
  }

  /**
   * Method: handleError
   * Description: 오류 세부 정보를 기록하여 API 오류를 처리합니다.
   * @param error
   */
  private handleError(error: unknown): void {
    if (axios.isAxiosError(error) && error.response) {
      console.error(`[API error]: ${error.response.status} ${error.response.statusText}`);
      console.error(error.response.data);
    } else {
      console.error('[API error]:', error instanceof Error ? error.message : error);
    }
  }
}
