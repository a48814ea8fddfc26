export type { ApiKeySet, Credentials } from "./types.js";
export { createCredentials, unwrapCredentials } from "./credentials.js";
export {
	buildRequest,
	canonicalParams,
	encodeQuery,
	sign,
	type HttpMethod,
	type ParamValue,
	type RequestParams,
	type SignedRequest,
} from "./signer.js";
