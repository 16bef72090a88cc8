import { buildCorsOriginHandler, normalizeOrigin } from '@/common/http/cors-policy';

describe('cors-policy', () => {
  it('normalizes origins removing trailing slash and lowercasing host', () => {
    expect(normalizeOrigin('http://127.0.0.1:5173/')).toBe('http://127.0.0.1:5173');
    expect(normalizeOrigin('https://Planning.Example.com')).toBe('https://planning.example.com');
  });

  it('rejects non-allowlisted origins in production', () => {
    const originHandler = buildCorsOriginHandler({
      NODE_ENV: 'production',
      ALLOWED_ORIGINS: ['https://planning.example.com'],
    });

    const callback = jest.fn<void, [Error | null, boolean?]>();
    originHandler('https://evil.example', callback);

    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback.mock.calls[0]?.[0]).toBeInstanceOf(Error);
    expect(callback.mock.calls[0]?.[1]).toBeUndefined();
  });

  it('accepts allowlisted origins by normalized value in production', () => {
    const originHandler = buildCorsOriginHandler({
      NODE_ENV: 'production',
      ALLOWED_ORIGINS: ['https://planning.example.com/'],
    });

    const callback = jest.fn<void, [Error | null, boolean?]>();
    originHandler('https://PLANNING.example.com', callback);

    expect(callback).toHaveBeenCalledWith(null, true);
  });

  it('allows any origin in development mode', () => {
    const originHandler = buildCorsOriginHandler({
      NODE_ENV: 'development',
      ALLOWED_ORIGINS: [],
    });

    const callback = jest.fn<void, [Error | null, boolean?]>();
    originHandler('https://any-origin.example', callback);

    expect(callback).toHaveBeenCalledWith(null, true);
  });
});
