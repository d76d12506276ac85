import type { AxiosAdapter } from 'axios';
import { StaticMapOptions } from "../../interfaces/config/Config";

/**
 * 클래스: StaticMapOptionsBuilder
 * 설명: 지도 이미지 요청을 위한 StaticMapOptions 빌더 클래스입니다.
 */
export class StaticMapOptionsBuilder {
    private staticMapOptions: StaticMapOptions = {};

    setBaseURL(baseURL: string): this {
        this.staticMapOptions.baseURL = baseURL;
        return this;
    }

    /** 요청 제한 시간 설정 (ms) */
    setTimeout(timeout: number): this {
        this.staticMapOptions.timeout = timeout;
        return this;
    }

    /** 요청 헤더 추가 */
    setHeader(name: string, value: string): this {
        this.staticMapOptions.headers = { ...this.staticMapOptions.headers, [name]: value };
        return this;
    }

    setAdapter(adapter?: AxiosAdapter): this {
        this.staticMapOptions.adapter = adapter;
        return this;
    }

    build(): StaticMapOptions {
        return { ...this.staticMapOptions };
    }
}
