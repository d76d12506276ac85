import path from 'path';
import sharp, { type OutputInfo, type Sharp } from 'sharp';
import { DecodeError } from '../../errors/MapImageError';
import { DecodableFormat, MapImage, OutputFormat } from '../../interfaces/image/MapImage';

const EXTENSION_FORMATS: Partial<Record<string, OutputFormat>> = {
  '.png': 'png',
  '.gif': 'gif',
  '.jpg': 'jpeg',
  '.jpeg': 'jpeg',
};

const MIME_TYPES: Record<OutputFormat, string> = {
  png: 'image/png',
  gif: 'image/gif',
  jpeg: 'image/jpeg',
};

/** png quality(0..100) 를 zlib 압축 수준(0..9)으로 환산 */
export function toCompressionLevel(quality: number): number {
  return Math.max(0, Math.min(9, Math.round((quality / 100) * 9)));
}

/**
 * Class: ImageCodec
 * Description: sharp 를 이용해 지도 이미지를 디코딩, 저장, 인코딩합니다.
 */
export class ImageCodec {
  /**
   * Method: decode
   * Description: 바이너리를 지정한 포맷으로 디코딩합니다.
   * 포맷이 다르거나 크기를 읽을 수 없으면 DecodeError 를 발생시킵니다.
   * @param data - 이미지 바이너리
   * @param mimeType - 응답 MIME 타입
   * @param expected - Content-Type 으로 판단한 포맷
   * @returns
   */
  public async decode(data: Buffer, mimeType: string, expected: DecodableFormat): Promise<MapImage> {
    try {
      const image = sharp(data);
      const { format, width, height } = await image.metadata();

      if (format !== expected || !width || !height) {
        throw new DecodeError('decode failed');
      }
      // 헤더 확인 후 전체 픽셀 디코딩
      await image.raw().toBuffer();

      return { data, mimeType, format: expected, width, height };
    } catch (error) {
      if (error instanceof DecodeError) {
        throw error;
      }
      throw new DecodeError('decode failed', error);
    }
  }

  /**
   * Method: save
   * Description: 이미지를 파일로 저장합니다.
   * format 이 없으면 파일 확장자, 그 다음 원본 포맷을 사용합니다.
   * @param image - 디코딩된 이미지
   * @param destination - 저장 경로
   * @param quality - 0..100 (jpeg 화질, png 압축 수준)
   * @param format - 저장 포맷
   * @returns sharp 의 저장 결과
   */
  public async save(image: MapImage, destination: string, quality?: number, format?: OutputFormat): Promise<OutputInfo> {
    const outputFormat = format ?? EXTENSION_FORMATS[path.extname(destination).toLowerCase()] ?? image.format;

    return this.pipeline(image, outputFormat, quality).toFile(destination);
  }

  /**
   * Method: encode
   * Description: 이미지를 지정한 포맷의 바이너리로 인코딩합니다.
   * @param image - 디코딩된 이미지
   * @param format - 출력 포맷
   * @param quality - 0..100 (jpeg 화질, png 압축 수준)
   * @returns
   */
  public async encode(image: MapImage, format: OutputFormat, quality?: number): Promise<Buffer> {
    return this.pipeline(image, format, quality).toBuffer();
  }

  /** 출력 포맷의 MIME 타입 */
  public mimeTypeOf(format: OutputFormat): string {
    return MIME_TYPES[format];
  }

  private pipeline(image: MapImage, format: OutputFormat, quality?: number): Sharp {
    const pipeline = sharp(image.data);

    switch (format) {
      case 'png':
        return pipeline.png(quality === undefined ? {} : { compressionLevel: toCompressionLevel(quality) });
      case 'jpeg':
        return pipeline.jpeg(quality === undefined ? {} : { quality });
      case 'gif':
        return pipeline.gif();
    }
  }
}
