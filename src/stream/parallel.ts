import type { StandardSchemaV1 } from '@standard-schema/spec';
import { type FetchAsyncOptions, fetchAsync } from '../core/fetchAsync.js';
import type { EnvelopeOf } from '../core/fetch.js';
import type { SafeWrap } from '../utils/wrap.js';
import { extract, type Item } from './item.js';
import type { Single } from './single.js';

/**
 * Observes two singles concurrently and waits for both to settle.
 * Each keeps its own item; one failing never affects the other.
 */
export function observeBoth<A, B>(a: Single<A>, b: Single<B>, signal?: AbortSignal): Promise<[Item<A>, Item<B>]> {
  return Promise.all([a.observe(signal), b.observe(signal)]);
}

/**
 * Runs two reactive fetches side by side and extracts both results.
 */
export async function fetchBoth<SA extends StandardSchemaV1, SB extends StandardSchemaV1>(
  a: FetchAsyncOptions<SA>,
  b: FetchAsyncOptions<SB>,
): Promise<[SafeWrap<Error, EnvelopeOf<SA>>, SafeWrap<Error, EnvelopeOf<SB>>]> {
  const [itemA, itemB] = await observeBoth(fetchAsync(a), fetchAsync(b));
  return [extract(itemA), extract(itemB)];
}
