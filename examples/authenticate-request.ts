/**
 * Authenticate Request — resolve Basic credentials and attach them.
 *
 * Credentials come from the URL first, then from a netrc table the caller
 * has already loaded. The request is printed in its log-safe form.
 * Run: npx tsx examples/authenticate-request.ts
 */

import { Credentials, HttpRequest, createLogger, netrcFromRecord } from "../src/index.js";

const logger = createLogger({ level: "info" });

// ── Netrc table as handed over by a loader ───────────────────────────

const netrc = netrcFromRecord({
	"packages.example.com": { login: "deploy", password: "placeholder-password" },
	default: { login: "anonymous", password: "" },
});

if (!netrc.ok) {
	logger.error({ issues: netrc.error.issues }, "Netrc table is invalid");
	process.exit(1);
}

// ── Resolve and attach ──────────────────────────────────────────────

const request = new HttpRequest("https://packages.example.com/simple/requests/", {
	headers: { Accept: "application/vnd.pypi.simple.v1+json" },
});

const credentials =
	Credentials.fromRequest(request) ?? Credentials.fromNetrc(netrc.value, request.url);

if (credentials) {
	credentials.authenticate(request);
	logger.info({ request: request.toJSON(), credentials }, "Request authenticated");
} else {
	logger.warn({ request: request.toJSON() }, "No credentials found");
}

// Hand-off to fetch carries the raw header values.
const init = request.toFetchInit();
logger.info({ method: init.method, headerCount: [...init.headers.keys()].length }, "Ready for fetch");
