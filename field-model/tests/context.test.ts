import { describe, expect, it } from 'vitest';
import type { OffsetProvider } from '../src/connectivity.js';
import { activeOffsetProvider, hasActiveContext, withOffsetProvider } from '../src/context.js';
import { Dimension } from '../src/dimension.js';
import { OffsetProviderError } from '../src/errors.js';

const K = new Dimension('K', 'vertical');

describe('withOffsetProvider', () => {
  it('exposes the provider while the body runs', () => {
    const seen = withOffsetProvider({ Koff: K }, (provider) => {
      expect(hasActiveContext()).toBe(true);
      expect(activeOffsetProvider()).toBe(provider);
      return provider.Koff;
    });
    expect(seen).toBe(K);
    expect(hasActiveContext()).toBe(false);
  });

  it('hands the body a frozen copy', () => {
    const given = { Koff: K };
    withOffsetProvider(given, (provider) => {
      expect(provider).not.toBe(given);
      expect(Object.isFrozen(provider)).toBe(true);
    });
  });

  it('refuses to open a second context', () => {
    withOffsetProvider({}, () => {
      expect(() => withOffsetProvider({}, () => 1)).toThrow(OffsetProviderError);
      expect(hasActiveContext()).toBe(true);
    });
    expect(hasActiveContext()).toBe(false);
  });

  it('releases the context when the body throws', () => {
    expect(() =>
      withOffsetProvider({}, () => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(activeOffsetProvider()).toBeUndefined();
  });

  it('rejects unsupported entries without opening a context', () => {
    // A provider read from untyped input
    const bad: OffsetProvider = JSON.parse('{"Koff": "K"}');
    expect(() => withOffsetProvider(bad, () => 1)).toThrow(OffsetProviderError);
    expect(hasActiveContext()).toBe(false);
  });
});
