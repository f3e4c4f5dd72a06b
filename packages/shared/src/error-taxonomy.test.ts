import { blockStatusToErrorCode, ERROR_TAXONOMY, getErrorInfo, getErrorKind } from './error-taxonomy';

describe('error taxonomy', () => {
  it('should describe known codes', () => {
    expect(getErrorInfo('BLOCK_STATUS_403')).toEqual(ERROR_TAXONOMY.BLOCK_STATUS_403);
    expect(getErrorInfo('BLOCK_STATUS_403')?.title).toBe('Access Forbidden');
  });

  it('should return null for a missing code', () => {
    expect(getErrorInfo(null)).toBeNull();
  });

  it('should fall back to a generic entry for unknown codes', () => {
    const info = getErrorInfo('SOMETHING_NEW');

    expect(info?.title).toBe('Unknown Error');
    expect(info?.description).toBe('Error: SOMETHING_NEW');
    expect(info?.kind).toBe('transport');
  });

  it('should map codes to their kind', () => {
    expect(getErrorKind('STRATEGY_MISCONFIGURED')).toBe('configuration');
    expect(getErrorKind('FETCH_TIMEOUT')).toBe('transport');
    expect(getErrorKind('BLOCK_CHALLENGE_PAGE')).toBe('blocked');
    expect(getErrorKind('ACQUISITION_EXHAUSTED')).toBe('exhaustion');
    expect(getErrorKind('INVALID_URL')).toBe('invalid_request');
  });

  it.each([
    [401, 'BLOCK_STATUS_401'],
    [403, 'BLOCK_STATUS_403'],
    [429, 'BLOCK_STATUS_429'],
    [503, 'BLOCK_STATUS_503'],
    [502, 'FETCH_HTTP_5XX'],
    [404, 'FETCH_HTTP_4XX'],
  ])('should map status %i to %s', (status, code) => {
    expect(blockStatusToErrorCode(status)).toBe(code);
  });
});
