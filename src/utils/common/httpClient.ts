/**
 * HTTP JSON Client
 * One GET per call, no retries. Every failure comes back as an AppError:
 * transport → SendRequest, 4xx/5xx → GetRequest, bad body → UnexpectedJsonShape
 * @module utils/common/httpClient
 */

import http from 'http';
import https from 'https';
import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { ZodType, ZodTypeDef } from 'zod';
import { AppError, toError } from '../../errors/index.js';
import { http as httpConfig } from '../../config/services.js';
// TYPES
export type QueryParams = Readonly<Record<string, string | number | boolean>>;

/**
 * The part of an axios instance the client needs
 */
export type HttpGetter = Pick<AxiosInstance, 'get'>;

export interface HttpClientOptions {
    userAgent?: string;
    timeout?: number;
}

export interface GetJsonOptions {
    /** Aborting rejects with axios' CanceledError, no AppError is created */
    signal?: AbortSignal;
}
// HELPERS
const utf8 = new TextDecoder('utf-8', { fatal: true });

function decodeBody(data: unknown): string {
    if (data instanceof ArrayBuffer || ArrayBuffer.isView(data)) {
        return utf8.decode(data);
    }
    throw new TypeError(`expected a binary response body, got ${typeof data}`);
}

function isErrorStatus(status: number): boolean {
    return status >= 400 && status <= 599;
}

/**
 * Shared axios instance with keep-alive pooling. `timeout` bounds the whole
 * request, connecting included. Every request carries `userAgent`.
 */
export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
    const {
        userAgent = httpConfig.userAgent,
        timeout = httpConfig.timeout,
    } = options;

    return axios.create({
        timeout,
        headers: { 'User-Agent': userAgent },
        httpAgent: new http.Agent({ keepAlive: true }),
        httpsAgent: new https.Agent({ keepAlive: true }),
    });
}
// HTTP JSON CLIENT CLASS
class HttpJsonClient {
    private readonly http: HttpGetter;

    constructor(httpClient: HttpGetter = createHttpClient()) {
        this.http = httpClient;
    }

    /**
     * GET `url` with `query` and parse the body with `schema`
     */
    async getJson<T>(
        url: URL | string,
        query: QueryParams,
        schema: ZodType<T, ZodTypeDef, unknown>,
        options: GetJsonOptions = {}
    ): Promise<T> {
        let response: AxiosResponse<ArrayBuffer>;
        try {
            response = await this.http.get<ArrayBuffer>(url.toString(), {
                params: query,
                responseType: 'arraybuffer',
                // status is classified below, not by axios
                validateStatus: () => true,
                signal: options.signal,
            });
        } catch (error) {
            if (axios.isCancel(error)) throw error;
            throw AppError.from({ type: 'SendRequest', cause: toError(error) });
        }

        const { status } = response;

        if (isErrorStatus(status)) {
            let body: string;
            try {
                body = decodeBody(response.data);
            } catch (error) {
                body = `Could not collect the GET request body: ${toError(error).message}`;
            }
            throw AppError.from({ type: 'GetRequest', status, body });
        }

        let json: unknown;
        try {
            json = JSON.parse(decodeBody(response.data));
        } catch (error) {
            throw AppError.from({ type: 'UnexpectedJsonShape', cause: toError(error) });
        }

        const parsed = schema.safeParse(json);
        if (!parsed.success) {
            throw AppError.from({ type: 'UnexpectedJsonShape', cause: parsed.error });
        }
        return parsed.data;
    }
}

export { HttpJsonClient };
export default HttpJsonClient;
