export { HeaderValue } from "./header-value.js";
export { HeaderMap } from "./headers.js";
export type { HeaderInit, HeaderMapOptions } from "./headers.js";
export { HttpRequest } from "./request.js";
export type { HttpRequestInit, RequestLike } from "./request.js";
export { hasUserinfo, percentDecode, redactUrl } from "./url.js";
