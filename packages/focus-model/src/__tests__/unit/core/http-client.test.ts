/**
 * HTTPClient Unit Tests
 *
 * - single attempt, no retry
 * - non-2xx -> HTTPStatusError
 * - abort -> HTTPTimeoutError
 * - transport failure -> NetworkError
 */

import { describe, it, expect } from 'vitest';
import { HTTPClient, parseMediaType } from '../../../core/http-client.js';
import { HTTPStatusError, HTTPTimeoutError, NetworkError } from '../../../core/errors.js';
import { fetchCall, stubFetch, stubFetchWith } from '../../utils/index.js';

const URL_UNDER_TEST = 'https://focustool.stsci.edu/images/focusdata2010.01.15_0000-0100.txt';

describe('HTTPClient', () => {
  describe('request', () => {
    it('should return status, media type and body bytes', async () => {
      stubFetch([{ url: URL_UNDER_TEST, contentType: 'text/plain; charset=utf-8', body: 'abc' }]);

      const response = await new HTTPClient().request(URL_UNDER_TEST);

      expect(response.url).toBe(URL_UNDER_TEST);
      expect(response.status).toBe(200);
      expect(response.contentType).toBe('text/plain');
      expect(Array.from(response.body)).toEqual([97, 98, 99]);
    });

    it('should send the user agent, method and body', async () => {
      const mock = stubFetch([{ url: URL_UNDER_TEST, method: 'POST', body: 'ok' }]);

      await new HTTPClient({ userAgent: 'test-agent/0.1' }).request(URL_UNDER_TEST, {
        method: 'POST',
        body: 'a=1',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      });

      const { init } = fetchCall(mock, 0);
      expect(init?.method).toBe('POST');
      expect(init?.body).toBe('a=1');
      expect(init?.headers).toEqual({
        'User-Agent': 'test-agent/0.1',
        'Content-Type': 'application/x-www-form-urlencoded',
      });
    });

    it('should throw HTTPStatusError for a non-2xx status without retrying', async () => {
      const mock = stubFetch([
        { url: URL_UNDER_TEST, status: 500, statusText: 'Internal Server Error', body: 'boom' },
      ]);

      const request = new HTTPClient().request(URL_UNDER_TEST);

      await expect(request).rejects.toBeInstanceOf(HTTPStatusError);
      await expect(request).rejects.toBeInstanceOf(NetworkError);
      await expect(request).rejects.toMatchObject({
        statusCode: 500,
        url: URL_UNDER_TEST,
        message: `Bad response from server: 500 Internal Server Error (${URL_UNDER_TEST})`,
      });
      expect(mock).toHaveBeenCalledTimes(1);
    });

    it('should wrap transport failures in NetworkError with the cause', async () => {
      const cause = new TypeError('fetch failed');
      stubFetchWith(async () => {
        throw cause;
      });

      const request = new HTTPClient().request(URL_UNDER_TEST);

      await expect(request).rejects.toBeInstanceOf(NetworkError);
      await expect(request).rejects.not.toBeInstanceOf(HTTPTimeoutError);
      await expect(request).rejects.toMatchObject({ message: 'Network error: fetch failed', cause });
    });

    it('should throw HTTPTimeoutError when the timeout aborts the request', async () => {
      stubFetchWith(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
          })
      );

      const request = new HTTPClient({ timeoutMs: 20 }).request(URL_UNDER_TEST);

      await expect(request).rejects.toBeInstanceOf(HTTPTimeoutError);
      await expect(request).rejects.toMatchObject({
        timeoutMs: 20,
        message: `Request timeout after 20ms: ${URL_UNDER_TEST}`,
      });
    });
  });

  describe('parseMediaType', () => {
    it('should strip parameters and lower-case', () => {
      expect(parseMediaType('Text/HTML; charset=ISO-8859-1')).toBe('text/html');
    });

    it('should return an empty string when the header is absent', () => {
      expect(parseMediaType(null)).toBe('');
    });
  });
});
