import { describe, expect, it } from "vitest"
import { parseDependencyRef } from "./dependency"
import { currentVersion, supportedVersions, upgradeEntity } from "./versions"

describe("supportedVersions", () => {
	it("lists every version with an upgrade path", () => {
		expect(supportedVersions("config")).toEqual([0, 1])
		expect(supportedVersions("package")).toEqual([0, 1])
		expect(supportedVersions("record")).toEqual([1])
	})
})

describe("upgradeEntity", () => {
	it("leaves current records untouched", () => {
		const raw = { name: "main", subscription_handler_version: 1 }

		expect(upgradeEntity("subscription", raw, "subscription")).toEqual({
			ok: true,
			value: raw,
		})
	})

	it("chains upgrades and stamps the current version", () => {
		const result = upgradeEntity("config", { config_handler_version: 0 }, "config")

		expect(result).toEqual({
			ok: true,
			value: {
				config_handler_version: currentVersion("config"),
				packages: [],
				providers: [],
				subscribed_artifactories: [],
			},
		})
	})

	it("keeps fields the upgrade does not own", () => {
		const result = upgradeEntity(
			"package",
			{ dependencies: ["a"], name: "x", package_handler_version: 0, sha256: "ABC" },
			"package",
		)

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(result.value).toEqual({
				dependencies: ["a"],
				name: "x",
				package_handler_version: 1,
				sha256: "abc",
			})
		}
	})

	it("rejects versions this build does not know", () => {
		const result = upgradeEntity("record", { record_handler_version: 0 }, "packages[3]")

		expect(result.ok).toBe(false)
		if (!result.ok && result.error.type === "unsupported_schema") {
			expect(result.error.entity).toBe("record")
			expect(result.error.version).toBe(0)
			expect(result.error.supported).toEqual([1])
			expect(result.error.message).toBe(
				"packages[3]: unsupported record handler version 0 (supported: 1).",
			)
		} else {
			throw new Error("expected unsupported_schema")
		}
	})

	it("rejects non-integer versions", () => {
		const result = upgradeEntity("app", { app_handler_version: "1" }, "apps[0]")

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("validation")
			expect(result.error.message).toBe(
				"apps[0]: app_handler_version must be a non-negative integer.",
			)
		}
	})
})

describe("parseDependencyRef", () => {
	it("keeps the raw reference", () => {
		expect(parseDependencyRef(" libfoo@>=1.2 <2 ", "dependencies[0]")).toEqual({
			ok: true,
			value: { name: "libfoo", range: ">=1.2 <2", raw: "libfoo@>=1.2 <2" },
		})
	})

	it("rejects an empty range", () => {
		const result = parseDependencyRef("libfoo@ ", "dependencies[0]")

		expect(result.ok).toBe(false)
	})
})
