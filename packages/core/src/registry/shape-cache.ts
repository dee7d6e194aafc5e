/**
 * Weakly-held cache of realized shapes.
 *
 * Entries never keep a shape alive. Once a shape is reclaimed its entry is
 * dropped by a finalizer; a lookup that reaches a dead reference first simply
 * misses. A finalizer only removes the entry it was registered for, so a shape
 * re-created under the same key survives the stale callback.
 */

export interface CacheEntry<V extends object> {
	readonly key: string;
	readonly ref: WeakRef<V>;
}

/**
 * Finalizer callback. Deletes `key` only while it still holds `ref`.
 * Returns whether the entry was deleted.
 */
export const evictIfStale = <V extends object>(
	entries: Map<string, WeakRef<V>>,
	{ key, ref }: CacheEntry<V>,
): boolean => entries.get(key) === ref && entries.delete(key);

export class ShapeCache<V extends object> {
	private readonly entries = new Map<string, WeakRef<V>>();

	private readonly finalizer = new FinalizationRegistry<CacheEntry<V>>(
		(entry) => {
			evictIfStale(this.entries, entry);
		},
	);

	get(key: string): V | undefined {
		return this.entries.get(key)?.deref();
	}

	set(key: string, value: V): void {
		const ref = new WeakRef(value);
		this.entries.set(key, ref);
		this.finalizer.register(value, { key, ref });
	}

	/**
	 * Returns the live value under `key`, or stores and returns the one built
	 * by `create`. Lookup and insert happen in one synchronous step.
	 */
	getOrCreate(
		key: string,
		create: () => V,
	): { readonly value: V; readonly created: boolean } {
		const existing = this.get(key);
		if (existing !== undefined) {
			return { value: existing, created: false };
		}
		const value = create();
		this.set(key, value);
		return { value, created: true };
	}

	/** Number of entries, dead references not yet finalized included. */
	get size(): number {
		return this.entries.size;
	}
}
