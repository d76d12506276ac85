import { MapImageRequestBuilder } from './builders/map/MapImageRequestBuilder';
import { StaticMapOptions } from './interfaces/config/Config';

export class StaticMap {
  private readonly options: StaticMapOptions;

  /**
   * StaticMap SDK의 인스턴스를 생성합니다.
   * 
   * @param config - baseURL, timeout 등 모든 요청에 공통으로 사용할 옵션입니다.
   */
  constructor(config: StaticMapOptions = {}) {
    this.options = { ...config };
  }

  /**
   * 공통 옵션이 적용된 지도 이미지 요청 빌더를 생성합니다.
   * 
   * @param location - 지도 중심 (선택 사항)
   */
  public request(location?: string): MapImageRequestBuilder {
    return new MapImageRequestBuilder(location).setOptions(this.options);
  }
}
