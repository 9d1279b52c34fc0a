import { describe, expect, it } from "vitest";
import { PLATFORM, isPlatform } from "../types/index.js";

describe("Platform", () => {
	it("defines exactly three platforms", () => {
		expect(Object.values(PLATFORM)).toEqual(["aws", "azure", "none"]);
	});

	it.each(["aws", "azure", "none"])("accepts %s", (value) => {
		expect(isPlatform(value)).toBe(true);
	});

	it.each(["AWS", "gcp", "", 1, null, undefined])("rejects %s", (value) => {
		expect(isPlatform(value)).toBe(false);
	});
});
