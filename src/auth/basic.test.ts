import { describe, expect, it } from "vitest";
import { HeaderEncodingError, MalformedAuthorizationError } from "../shared/errors.js";
import { decodeBasicToken, encodeBasicToken } from "./basic.js";

describe("encodeBasicToken", () => {
	it("encodes user:password with padding", () => {
		expect(encodeBasicToken("user", "password")).toBe("dXNlcjpwYXNzd29yZA==");
	});

	it("encodes empty fields around the colon", () => {
		expect(encodeBasicToken("", "")).toBe("Og==");
	});

	it("encodes non-ASCII as UTF-8", () => {
		expect(encodeBasicToken("é", "")).toBe(Buffer.from("é:", "utf8").toString("base64"));
	});

	it("throws on a lone surrogate and names the field", () => {
		expect(() => encodeBasicToken("user", "\uD800")).toThrow(HeaderEncodingError);
		try {
			encodeBasicToken("\uDC00user", "password");
			expect.unreachable();
		} catch (e) {
			expect(e).toBeInstanceOf(HeaderEncodingError);
			if (e instanceof HeaderEncodingError) expect(e.context).toEqual({ field: "username" });
		}
	});
});

describe("decodeBasicToken", () => {
	it("splits the payload on the first colon", () => {
		expect(decodeBasicToken("dXNlcjpwYXNzd29yZD09")).toEqual({
			ok: true,
			value: { username: "user", password: "password==" },
		});
	});

	it("returns empty strings for empty halves", () => {
		expect(decodeBasicToken("Og==")).toEqual({ ok: true, value: { username: "", password: "" } });
	});

	it.each([
		["characters outside the alphabet", "dXNl*jpw"],
		["missing padding", "Og"],
		["url-safe alphabet", "-_-_"],
		["embedded whitespace", "dXNl cjpwYXNzd29yZA=="],
	])("rejects %s", (_name, token) => {
		const result = decodeBasicToken(token);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(MalformedAuthorizationError);
			expect(result.error.message).toBe("Basic credentials are not valid base64");
		}
	});

	it("rejects a payload without a colon", () => {
		const result = decodeBasicToken("dXNlcg==");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe("Basic credentials are missing the `:` separator");
		}
	});

	it("rejects a payload that is not UTF-8", () => {
		const result = decodeBasicToken(Buffer.from([0x75, 0x3a, 0xc3]).toString("base64"));
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe("Basic credentials are not valid UTF-8");
			expect(result.error.cause).toBeInstanceOf(TypeError);
		}
	});

	it("errors carry no secret material", () => {
		const result = decodeBasicToken("c2VjcmV0");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(JSON.stringify(result.error)).not.toContain("secret");
		}
	});
});
