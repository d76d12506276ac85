export * from "./StaticMap";
export * from './errors/MapImageError';
export * from './util/buildQueryString';

export * from './services/fetch/ImageFetcher';
export * from './services/image/ImageCodec';

export * from './builders/config/StaticMapOptionsBuilder';
export * from './builders/map/MapImageRequestBuilder';

export * from './interfaces/config/Config';
export * from './interfaces/image/MapImage';
export * from './interfaces/map/MapParameters';
