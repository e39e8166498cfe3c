export { AUTHORIZATION, BASIC_PREFIX, Credentials } from "./credentials.js";
export { decodeBasicToken, encodeBasicToken } from "./basic.js";
export type { BasicPair } from "./basic.js";
export { DEFAULT_NETRC_HOST, createNetrc, lookupNetrcEntry, netrcFromRecord } from "./netrc.js";
export type { Netrc, NetrcEntry } from "./netrc.js";
