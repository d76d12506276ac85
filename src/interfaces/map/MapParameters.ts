/**
 * Type: ImageFormat
 * Description: 생성될 지도 이미지 포맷 (기본값: png)
 */
export type ImageFormat = 'png' | 'png32' | 'gif' | 'jpg' | 'jpg-baseline';

/**
 * Type: MapType
 * Description: 지도 종류 (기본값: roadmap)
 */
export type MapType = 'roadmap' | 'satellite' | 'terrain' | 'hybrid';

/**
 * Type: ParameterValue
 * Description: 쿼리 문자열로 직렬화될 수 있는 파라미터 값입니다.
 * null 또는 빈 배열은 쿼리에서 제외됩니다.
 */
export type ParameterValue = null | boolean | number | string | string[];

/**
 * Type: ParameterGroup
 * Description: 파라미터 이름과 값의 묶음입니다.
 */
export type ParameterGroup = Readonly<Record<string, ParameterValue>>;

/**
 * Type: LocationParameters
 * Description: 지도 중심 위치 파라미터를 나타냅니다.
 */
export type LocationParameters = {
  /** 지도 중심. "40.714728,-73.998672" 형식의 좌표 또는 "city hall, new york, ny" 같은 주소 */
  center: string | null;
  /** 확대 수준, 기본값: 10 */
  zoom: number;
};

/**
 * Type: MapParameters
 * Description: 지도 이미지 파라미터를 나타냅니다.
 */
export type MapParameters = {
  /** 이미지 크기 {가로}x{세로}, 기본값: 500x400 */
  size: string;
  format: ImageFormat;
  maptype: MapType;
  /** 지도 라벨 언어 */
  language: string | null;
  /** 국경 표시 기준 지역 코드 (ccTLD 2자) */
  region: string | null;
};

/**
 * Type: FeatureParameters
 * Description: 지도 위에 표시할 마커, 경로, 스타일 파라미터를 나타냅니다.
 */
export type FeatureParameters = {
  /** 마커 정의 목록. 각 정의는 '|'로 구분된 값이며 markers 파라미터로 반복 전송됩니다. */
  markers: string[];
  /** '|'로 구분된 경로 좌표 */
  path: string | null;
  /** 마커 없이 지도에 반드시 보여야 하는 위치 */
  visible: string | null;
  /** 사용자 지정 스타일 규칙 목록 (style 파라미터로 반복 전송) */
  style: string[];
};

/**
 * Type: ReportingParameters
 * Description: 위치 센서 사용 여부 파라미터를 나타냅니다.
 */
export type ReportingParameters = {
  /** 위치 센서 사용 여부, 기본값: false */
  sensor: boolean;
};

/**
 * Interface: StaticMapParameters
 * Description: 하나의 지도 이미지 요청을 구성하는 전체 파라미터 그룹입니다.
 * 그룹 간 키는 중복되지 않습니다.
 */
export interface StaticMapParameters {
  location: LocationParameters;
  map: MapParameters;
  feature: FeatureParameters;
  reporting: ReportingParameters;
}

/**
 * const: 직렬화 순서대로 나열한 파라미터 그룹
 */
export const PARAMETER_GROUPS = ['location', 'map', 'feature', 'reporting'] as const;

/**
 * Function: createDefaultParameters
 * Description: 기본값으로 채운 파라미터 그룹을 생성합니다.
 */
export function createDefaultParameters(): StaticMapParameters {
  return {
    location: {
      center: null,
      zoom: 10,
    },
    map: {
      size: '500x400',
      format: 'png',
      maptype: 'roadmap',
      language: null,
      region: null,
    },
    feature: {
      markers: [],
      path: null,
      visible: null,
      style: [],
    },
    reporting: {
      sensor: false,
    },
  };
}
