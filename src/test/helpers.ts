import type { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import sharp from 'sharp';
import { OutputFormat } from '../interfaces/image/MapImage';

/** 4x3 단색 이미지 생성 */
export async function createImage(format: OutputFormat): Promise<Buffer> {
  const image = sharp({
    create: { width: 4, height: 3, channels: 3, background: { r: 200, g: 40, b: 40 } },
  });

  switch (format) {
    case 'png':
      return image.png().toBuffer();
    case 'jpeg':
      return image.jpeg().toBuffer();
    case 'gif':
      return image.gif().toBuffer();
  }
}

/**
 * Interface: RecordedRequest
 * Description: 가짜 adapter 가 받은 요청 설정을 기록합니다.
 */
export interface RecordedRequest {
  requests: InternalAxiosRequestConfig[];
  adapter: AxiosAdapter;
}

/** 고정된 본문과 Content-Type 으로 응답하는 in-process adapter */
export function imageAdapter(data: Buffer, contentType?: string): RecordedRequest {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    return {
      data,
      status: 200,
      statusText: 'OK',
      headers: contentType === undefined ? {} : { 'content-type': contentType },
      config,
    };
  };

  return { requests, adapter };
}

/** 32x32 그라데이션 PNG (1024 색) */
export async function createPatternImage(): Promise<Buffer> {
  const width = 32;
  const height = 32;
  const pixels = Buffer.alloc(width * height * 3);

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const offset = (y * width + x) * 3;
      pixels[offset] = x * 8;
      pixels[offset + 1] = y * 8;
      pixels[offset + 2] = (x * y) % 256;
    }
  }

  return sharp(pixels, { raw: { width, height, channels: 3 } }).png().toBuffer();
}
