import { InvalidArgumentError } from '../errors/MapImageError';
import { ParameterGroup, ParameterValue } from '../interfaces/map/MapParameters';

/**
 * Function: buildQueryString
 * Description: 파라미터 그룹들을 하나의 쿼리 문자열로 직렬화합니다.
 *  - boolean 은 "true" / "false"
 *  - 배열은 요소마다 key=value 를 반복
 *  - null 또는 빈 배열은 제외
 * @param groups - 직렬화 순서대로 나열한 그룹
 * @returns '?' 없는 쿼리 문자열
 */
export function buildQueryString(groups: readonly ParameterGroup[]): string {
  const query = new URLSearchParams();
  const seen = new Set<string>();

  for (const group of groups) {
    for (const [key, value] of Object.entries(group)) {
      if (seen.has(key)) {
        throw new InvalidArgumentError(`duplicate parameter: ${key}`);
      }
      seen.add(key);
      appendParameter(query, key, value);
    }
  }

  return query.toString();
}

function appendParameter(query: URLSearchParams, key: string, value: ParameterValue): void {
  if (value === null) {
    return;
  }
  if (typeof value === 'boolean') {
    query.append(key, value ? 'true' : 'false');
    return;
  }
  if (Array.isArray(value)) {
    for (const item of value) {
      query.append(key, item);
    }
    return;
  }
  query.append(key, String(value));
}
