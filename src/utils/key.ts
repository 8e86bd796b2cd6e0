/**
 * Compose the wire-level key for a cached resource.
 *
 * The separator is not escaped, so `("a:b", "c")` and `("a", "b:c")`
 * both compose to `"a:b:c"`.
 *
 * @example
 * composeKey("session", "42") // => "session:42"
 * composeKey("user", "42:profile") // => "user:42:profile"
 */
export function composeKey(resourceType: string, key: string): string {
	return `${resourceType}:${key}`;
}
