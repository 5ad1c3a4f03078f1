/**
 * Google Drive byte sources
 *
 * A byte source turns a file identifier into a readable stream. The
 * downloader only depends on the DriveByteSource interface, so the
 * interstitial handling below can be swapped out when Drive changes markup.
 */

import axios, { AxiosResponse } from 'axios';
import { Readable } from 'stream';
import { config } from '../../config';
import logger from '../../utils/logger';
import { DRIVE } from '../../utils/constants';

/**
 * An open download: the body stream and its declared length (0 when unknown)
 */
export interface DriveByteStream {
    stream: Readable;
    totalBytes: number;
}

export interface DriveByteSource {
    open(fileId: string): Promise<DriveByteStream>;
}

type HeaderBag = Record<string, unknown>;

const CONFIRM_TOKEN_REGEX = /confirm=([^&"]+)/;

/**
 * Read a header value regardless of how the HTTP layer cased its name
 */
function getHeader(headers: HeaderBag, name: string): unknown {
    const wanted = name.toLowerCase();
    const key = Object.keys(headers).find(k => k.toLowerCase() === wanted);
    return key === undefined ? undefined : headers[key];
}

/**
 * Collect "name=value" pairs from Set-Cookie headers into the jar
 */
export function collectCookies(headers: HeaderBag, jar: Map<string, string>): void {
    const raw = getHeader(headers, 'set-cookie');
    const lines = Array.isArray(raw) ? raw : typeof raw === 'string' ? [raw] : [];

    for (const line of lines) {
        if (typeof line !== 'string') continue;
        const pair = line.split(';')[0];
        const separator = pair.indexOf('=');
        if (separator <= 0) continue;
        jar.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
    }
}

/**
 * Token from the first cookie whose key marks a virus-scan warning
 */
export function findWarningCookieToken(jar: Map<string, string>): string | null {
    for (const [key, value] of jar) {
        if (key.startsWith(DRIVE.WARNING_COOKIE_PREFIX)) {
            return value;
        }
    }
    return null;
}

/**
 * Token from the first HTML line that mentions both "download" and "confirm"
 * and actually carries a `confirm=` value
 */
export function findConfirmTokenInHtml(html: string): string | null {
    for (const line of html.split(/\r?\n/)) {
        if (!line.includes('download') || !line.includes('confirm')) {
            continue;
        }
        const match = line.match(CONFIRM_TOKEN_REGEX);
        if (match && match[1]) {
            return match[1];
        }
    }
    return null;
}

export function parseContentLength(headers: HeaderBag): number {
    const raw = getHeader(headers, 'content-length');
    const parsed = typeof raw === 'number' ? raw : parseInt(String(raw ?? ''), 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}

function isHtmlResponse(headers: HeaderBag): boolean {
    const contentType = getHeader(headers, 'content-type');
    return typeof contentType === 'string' && contentType.includes('text/html');
}

async function readStreamText(stream: Readable): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString('utf8');
}

/**
 * Default strategy: the public uc?export=download endpoint, following the
 * large-file confirmation step through a cookie or the interstitial page.
 */
export class ConfirmTokenByteSource implements DriveByteSource {
    constructor(private readonly downloadUrl: string = config.drive.downloadUrl) {}

    async open(fileId: string): Promise<DriveByteStream> {
        const jar = new Map<string, string>();

        let response = await this.request(fileId, jar);

        const cookieToken = findWarningCookieToken(jar);
        if (cookieToken) {
            logger.debug(`[Google Drive] Confirming download of ${fileId} via warning cookie`);
            response.data.destroy();
            response = await this.request(fileId, jar, cookieToken);
        }

        if (isHtmlResponse(response.headers)) {
            const html = await readStreamText(response.data);
            const htmlToken = findConfirmTokenInHtml(html);
            if (!htmlToken) {
                throw new Error('Drive returned an HTML page without a confirmation token');
            }

            logger.debug(`[Google Drive] Confirming download of ${fileId} via interstitial page`);
            response = await this.request(fileId, jar, htmlToken);

            if (isHtmlResponse(response.headers)) {
                response.data.destroy();
                throw new Error('Drive still returned an HTML page after confirmation');
            }
        }

        return {
            stream: response.data,
            totalBytes: parseContentLength(response.headers)
        };
    }

    private async request(fileId: string, jar: Map<string, string>, confirm?: string): Promise<AxiosResponse<Readable>> {
        const params: Record<string, string> = { export: 'download', id: fileId };
        if (confirm) {
            params.confirm = confirm;
        }

        const headers: Record<string, string> = {};
        if (jar.size > 0) {
            headers.Cookie = Array.from(jar, ([key, value]) => `${key}=${value}`).join('; ');
        }

        const response = await axios.get<Readable>(this.downloadUrl, {
            params,
            headers,
            responseType: 'stream'
        });

        collectCookies(response.headers, jar);
        return response;
    }
}
