export {
	type AuthMethod,
	type AuthProvider,
	type AuthProviderConfig,
	createAuthProvider,
	DEFAULT_JWT_LIFETIME_SECONDS,
	type KeyPairAuthConfig,
	type PatAuthConfig,
} from "./auth-provider.js";
export {
	type BuildClaimsOptions,
	buildClaims,
	type KeyPairClaims,
	normalizeIdentifier,
	signJwt,
} from "./sign.js";
export { SigningKey } from "./signing-key.js";
