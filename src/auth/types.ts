/**
 * Auth bounded context — credential types.
 */

/** Raw API key material, held only until sealed by createCredentials(). */
export interface ApiKeySet {
	readonly apiKey: string;
	/** HMAC-SHA256 signing secret. */
	readonly secret: string;
}

/**
 * Opaque credential handle. Stringifying, serializing or inspecting it yields
 * "[REDACTED]"; unwrapCredentials() is the only way back to the keys.
 */
export interface Credentials {
	readonly __opaque: true;
	toString(): string;
	toJSON(): string;
}
