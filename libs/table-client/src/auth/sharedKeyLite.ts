import { createHmac } from 'crypto';
import { getHeader } from '@tablestore/resilient-http-core';
import type { BeforeSendContext, HttpRequestInterceptor } from '@tablestore/resilient-http-core';
import { HeaderNames } from '../constants';

export interface SharedKeyCredentials {
  accountName: string;
  /** Base64-encoded account key. */
  accountKey: string;
}

/**
 * `<x-ms-date>\n/<account><path>[?comp=<value>]`. The path is taken as it
 * appears on the wire, already percent-encoded.
 */
export function buildSharedKeyLiteStringToSign(accountName: string, url: string, date: string): string {
  const parsed = new URL(url);
  const comp = parsed.searchParams.get('comp');
  const resource = `/${accountName}${parsed.pathname}${comp !== null ? `?comp=${comp}` : ''}`;
  return `${date}\n${resource}`;
}

export const signSharedKeyLite = (accountKey: string, stringToSign: string): string =>
  createHmac('sha256', Buffer.from(accountKey, 'base64')).update(stringToSign, 'utf8').digest('base64');

/**
 * Signs every attempt with `SharedKeyLite <account>:<signature>`. Needs the
 * `x-ms-date` header, so register it after the date interceptor.
 */
export function createSharedKeyLiteInterceptor(credentials: SharedKeyCredentials): HttpRequestInterceptor {
  return {
    beforeSend: (ctx: BeforeSendContext) => {
      const date = getHeader(ctx.request.headers, HeaderNames.date);
      if (!date) {
        throw new Error(`Cannot sign request without an ${HeaderNames.date} header`);
      }
      const signature = signSharedKeyLite(
        credentials.accountKey,
        buildSharedKeyLiteStringToSign(credentials.accountName, ctx.request.url, date),
      );
      ctx.request.headers[HeaderNames.authorization] = `SharedKeyLite ${credentials.accountName}:${signature}`;
    },
  };
}
