import type { AxiosAdapter } from 'axios';

/**
   * const: Static Maps API 기본 설정
   */
export const CONFIG = {
    BASE_URL: "https://maps.googleapis.com/maps/api/staticmap",
    TIMEOUT: 10000,
  };
  
  /**
   * Interface: StaticMapOptions
   * Description: 지도 이미지 요청 시 사용하는 HTTP 옵션을 나타냅니다.
   */
  export interface StaticMapOptions {
    /** 요청 baseURL (기본값: CONFIG.BASE_URL) */
    baseURL?: string;
    /** 요청 제한 시간(ms), 기본값: 10000 */
    timeout?: number;
    /** 추가 요청 헤더 */
    headers?: Record<string, string>;
    /** Axios adapter (다른 전송 방식을 사용할 경우) */
    adapter?: AxiosAdapter;
  }
