import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, resolveConfig } from '../src/config.js';
import { TxCodecErrorCodes } from '../src/errors.js';
import { expectCodecError } from './helpers.js';

describe('resolveConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveConfig({}, {})).toEqual(DEFAULT_CONFIG);
  });

  it('reads the environment', () => {
    expect(resolveConfig({}, { TXCODEC_FORMAT: 'json', TXCODEC_VERBOSE: 'true' })).toEqual({
      format: 'json',
      verbose: true,
    });
  });

  it('prefers explicit options over the environment', () => {
    expect(
      resolveConfig({ format: 'text', verbose: false }, { TXCODEC_FORMAT: 'json', TXCODEC_VERBOSE: '1' })
    ).toEqual({ format: 'text', verbose: false });
  });

  it('treats an empty environment value as unset', () => {
    expect(resolveConfig({}, { TXCODEC_FORMAT: '', TXCODEC_VERBOSE: '' })).toEqual(DEFAULT_CONFIG);
  });

  it('rejects an unknown format', () => {
    expectCodecError(() => resolveConfig({ format: 'xml' }, {}), TxCodecErrorCodes.InvalidFormat);
  });
});
