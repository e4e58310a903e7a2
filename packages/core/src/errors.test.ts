import { describe, expect, it } from "vitest";
import { BarsignalError, ConfigError, InvalidInputError, describeError } from "./errors";

describe("errors", () => {
	it("tags invalid input with its code and details", () => {
		const error = new InvalidInputError("Bars are empty", { count: 0 });
		expect(error).toBeInstanceOf(BarsignalError);
		expect(error.name).toBe("InvalidInputError");
		expect(error.code).toBe("INVALID_INPUT");
		expect(error.details).toEqual({ count: 0 });
	});

	it("tags config failures", () => {
		const error = new ConfigError("Missing profile");
		expect(error.name).toBe("ConfigError");
		expect(error.code).toBe("CONFIG_ERROR");
		expect(error.details).toBeUndefined();
	});

	it("describes unknown thrown values", () => {
		expect(describeError(new ConfigError("bad"))).toBe("bad");
		expect(describeError("oops")).toBe("Unknown error");
	});
});
