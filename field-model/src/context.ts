// Offset-provider context: the connectivities visible to one outermost
// operator call and every call nested inside it.
//
// There is a single slot per process. It is a guard, not a stack: opening a
// context while one is active fails.

import { type OffsetProvider, checkProviderEntry } from './connectivity.js';
import { OffsetProviderError } from './errors.js';

let active: OffsetProvider | undefined;

export function activeOffsetProvider(): OffsetProvider | undefined {
  return active;
}

export function hasActiveContext(): boolean {
  return active !== undefined;
}

/**
 * Run `body` with `provider` as the active context. The context is released
 * when `body` returns or throws.
 */
export function withOffsetProvider<T>(provider: OffsetProvider, body: (provider: OffsetProvider) => T): T {
  if (active !== undefined) {
    throw new OffsetProviderError('An offset provider context is already active; outermost calls cannot be nested');
  }
  for (const [name, entry] of Object.entries(provider)) {
    checkProviderEntry(name, entry);
  }

  const scoped = Object.freeze({ ...provider });
  active = scoped;
  try {
    return body(scoped);
  } finally {
    active = undefined;
  }
}
