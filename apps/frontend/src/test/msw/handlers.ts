import { http, HttpResponse } from 'msw';

export const PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x01]);

export function mockResource(bytes: Uint8Array, opts: { etag?: string; contentType?: string } = {}) {
  return http.get('*/resource', () => {
    const headers: Record<string, string> = { 'Content-Type': opts.contentType ?? 'image/png' };
    if (opts.etag) headers.ETag = opts.etag;
    return new HttpResponse(bytes, { status: 200, headers });
  });
}

export function mockResourceError(status: 404 | 500, errorCode: string, text: string) {
  return http.get('*/resource', () =>
    new HttpResponse(text, {
      status,
      headers: { 'Content-Type': 'text/plain; charset=utf-8', 'X-Error-Code': errorCode, 'X-Request-Id': `req-${status}` },
    }),
  );
}
