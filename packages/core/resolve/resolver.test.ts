import { describe, expect, it } from "vitest"
import { app, entry, hash, nes, pkg, sourceName } from "../testing/builders"
import type { AppRequest } from "./catalog"
import { resolveApp } from "./resolver"

function request(name: string, source?: string): AppRequest {
	return { name: nes(name), source: source ? sourceName(source) : undefined }
}

function planNames(result: ReturnType<typeof resolveApp>): string[] {
	if (!result.ok) {
		throw new Error(result.error.message)
	}
	return result.value.packages.map((planned) => `${planned.package.name}@${planned.package.version}`)
}

describe("resolveApp", () => {
	// =========================================================================
	// PLANS
	// =========================================================================

	it("plans exactly the root package for an app without dependencies", () => {
		const catalog = [entry("main", app("hello", "1.0.0", [pkg("hello", "1.0.0")]))]

		const result = resolveApp(catalog, request("hello"))

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(result.value.packages).toHaveLength(1)
			expect(result.value.packages[0]).toEqual({
				locator: { path: "/srv/main/packages/hello-1.0.0.tar.gz", type: "local" },
				package: pkg("hello", "1.0.0"),
				requiredBy: [],
				source: "main",
			})
			expect(result.value.entry.source).toBe("main")
		}
	})

	it("orders dependencies before the packages that need them", () => {
		const catalog = [
			entry(
				"main",
				app("a", "1.0.0", [
					pkg("a", "1.0.0", { dependencies: ["b"] }),
					pkg("b", "1.0.0", { dependencies: ["c"] }),
					pkg("c", "1.0.0"),
				]),
			),
		]

		const result = resolveApp(catalog, request("a"))

		expect(planNames(result)).toEqual(["c@1.0.0", "b@1.0.0", "a@1.0.0"])
		if (result.ok) {
			expect(result.value.packages.map((planned) => planned.requiredBy)).toEqual([
				["b"],
				["a"],
				[],
			])
		}
	})

	it("plans a shared dependency once and records every dependent", () => {
		const catalog = [
			entry(
				"main",
				app("a", "1.0.0", [
					pkg("a", "1.0.0", { dependencies: ["b", "c"] }),
					pkg("b", "1.0.0", { dependencies: ["d"] }),
					pkg("c", "1.0.0", { dependencies: ["d"] }),
					pkg("d", "1.0.0"),
				]),
			),
		]

		const result = resolveApp(catalog, request("a"))

		expect(planNames(result)).toEqual(["d@1.0.0", "b@1.0.0", "c@1.0.0", "a@1.0.0"])
		if (result.ok) {
			expect(result.value.packages[0]?.requiredBy).toEqual(["b", "c"])
		}
	})

	it("finds dependencies offered by other apps and sources", () => {
		const catalog = [
			entry("main", app("a", "1.0.0", [pkg("a", "1.0.0", { dependencies: ["lib"] })])),
			entry("extra", app("lib", "1.0.0", [pkg("lib", "1.0.0")])),
		]

		const result = resolveApp(catalog, request("a"))

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(result.value.packages[0]?.source).toBe("extra")
			expect(result.value.packages[0]?.locator).toEqual({
				path: "/srv/extra/packages/lib-1.0.0.tar.gz",
				type: "local",
			})
		}
	})

	it("prefers the highest version inside the requested range", () => {
		const catalog = [
			entry(
				"main",
				app("a", "1.0.0", [
					pkg("a", "1.0.0", { dependencies: ["b@^1.0.0"] }),
					pkg("b", "1.0.0"),
					pkg("b", "1.2.0"),
					pkg("b", "2.0.0"),
				]),
			),
		]

		expect(planNames(resolveApp(catalog, request("a")))).toEqual(["b@1.2.0", "a@1.0.0"])
	})

	it("picks the highest root version and breaks ties by locator", () => {
		const catalog = [
			entry(
				"main",
				app("tool", "1.0.0", [
					pkg("tool", "1.1.0", { sha256: hash("b"), source: "z/tool.tar.gz" }),
					pkg("tool", "1.1.0", { sha256: hash("c"), source: "a/tool.tar.gz" }),
					pkg("tool", "1.0.0"),
					pkg("helper", "9.0.0"),
				]),
			),
		]

		const result = resolveApp(catalog, request("tool"))

		expect(planNames(result)).toEqual(["tool@1.1.0"])
		if (result.ok) {
			expect(result.value.packages[0]?.locator).toEqual({
				path: "/srv/main/a/tool.tar.gz",
				type: "local",
			})
		}
	})

	it("uses any package as root when none is named like the app", () => {
		const catalog = [
			entry("main", app("suite", "1.0.0", [pkg("core", "1.0.0"), pkg("core", "2.0.0")])),
		]

		expect(planNames(resolveApp(catalog, request("suite")))).toEqual(["core@2.0.0"])
	})

	it("restarts with accumulated requirements instead of failing", () => {
		const catalog = [
			entry(
				"main",
				app("a", "1.0.0", [
					pkg("a", "1.0.0", { dependencies: ["b", "c"] }),
					pkg("b", "1.0.0", { dependencies: ["d"] }),
					pkg("c", "1.0.0", { dependencies: ["d@^1.0.0"] }),
					pkg("d", "1.0.0"),
					pkg("d", "2.0.0"),
				]),
			),
		]

		const result = resolveApp(catalog, request("a"))

		expect(planNames(result)).toEqual(["d@1.0.0", "b@1.0.0", "c@1.0.0", "a@1.0.0"])
		if (result.ok) {
			expect(result.value.packages[0]?.requiredBy).toEqual(["b", "c"])
		}
	})

	it("drops requirements of a version it stopped choosing after a restart", () => {
		const catalog = [
			entry(
				"main",
				app("r", "1.0.0", [
					pkg("r", "1.0.0", { dependencies: ["b", "c"] }),
					pkg("b", "2.0.0", { dependencies: ["x@^2.0.0"] }),
					pkg("b", "1.0.0"),
					pkg("c", "1.0.0", { dependencies: ["b@^1.0.0", "x@^1.0.0"] }),
					pkg("x", "1.0.0"),
					pkg("x", "2.0.0"),
				]),
			),
		]

		const result = resolveApp(catalog, request("r"))

		expect(planNames(result)).toEqual(["b@1.0.0", "x@1.0.0", "c@1.0.0", "r@1.0.0"])
		if (result.ok) {
			expect(result.value.packages[1]?.requiredBy).toEqual(["c"])
		}
	})

	it("returns identical plans for identical input", () => {
		const catalog = [
			entry(
				"main",
				app("a", "1.0.0", [
					pkg("a", "1.0.0", { dependencies: ["b", "c"] }),
					pkg("b", "1.0.0"),
					pkg("c", "1.0.0"),
				]),
			),
		]

		expect(resolveApp(catalog, request("a"))).toEqual(resolveApp(catalog, request("a")))
	})

	// =========================================================================
	// FAILURES
	// =========================================================================

	it("fails with not_found for an unknown app", () => {
		const result = resolveApp([], request("ghost"))

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("not_found")
			expect(result.error.message).toBe(
				'App "ghost" was not found in any subscribed artifactory.',
			)
		}
	})

	it("fails with ambiguous_app when two sources offer the app", () => {
		const catalog = [
			entry("main", app("hello", "1.0.0", [pkg("hello", "1.0.0")])),
			entry("extra", app("hello", "1.0.0", [pkg("hello", "1.0.0", { sha256: hash("b") })])),
		]

		const result = resolveApp(catalog, request("hello"))

		expect(result.ok).toBe(false)
		if (!result.ok && result.error.type === "ambiguous_app") {
			expect(result.error.candidates).toEqual([
				{ name: "hello", source: "main", version: "1.0.0" },
				{ name: "hello", source: "extra", version: "1.0.0" },
			])
			expect(result.error.message).toBe(
				'App "hello" is offered by several sources: main/hello@1.0.0, extra/hello@1.0.0.',
			)
		} else {
			throw new Error("expected ambiguous_app")
		}
	})

	it("resolves a qualified request when the name is ambiguous", () => {
		const catalog = [
			entry("main", app("hello", "1.0.0", [pkg("hello", "1.0.0")])),
			entry("extra", app("hello", "2.0.0", [pkg("hello", "2.0.0")])),
		]

		const result = resolveApp(catalog, request("hello", "extra"))

		expect(planNames(result)).toEqual(["hello@2.0.0"])
	})

	it("fails with dependency_cycle naming the cycle", () => {
		const catalog = [
			entry(
				"main",
				app("a", "1.0.0", [
					pkg("a", "1.0.0", { dependencies: ["b"] }),
					pkg("b", "1.0.0", { dependencies: ["a"] }),
				]),
			),
		]

		const result = resolveApp(catalog, request("a"))

		expect(result.ok).toBe(false)
		if (!result.ok && result.error.type === "dependency_cycle") {
			expect(result.error.cycle).toEqual(["a", "b", "a"])
			expect(result.error.message).toBe("Dependency cycle: a -> b -> a.")
		} else {
			throw new Error("expected dependency_cycle")
		}
	})

	it("fails with missing_dependency naming the missing package", () => {
		const catalog = [
			entry("main", app("a", "1.0.0", [pkg("a", "1.0.0", { dependencies: ["ghost"] })])),
		]

		const result = resolveApp(catalog, request("a"))

		expect(result.ok).toBe(false)
		if (!result.ok && result.error.type === "missing_dependency") {
			expect(result.error.name).toBe("ghost")
			expect(result.error.requiredBy).toBe("a")
			expect(result.error.range).toBeUndefined()
		} else {
			throw new Error("expected missing_dependency")
		}
	})

	it("fails with missing_dependency when no version is in range", () => {
		const catalog = [
			entry(
				"main",
				app("a", "1.0.0", [
					pkg("a", "1.0.0", { dependencies: ["b@^2.0.0"] }),
					pkg("b", "1.0.0"),
				]),
			),
		]

		const result = resolveApp(catalog, request("a"))

		expect(result.ok).toBe(false)
		if (!result.ok && result.error.type === "missing_dependency") {
			expect(result.error.range).toBe("^2.0.0")
			expect(result.error.message).toBe(
				'Package "b@^2.0.0" required by "a" was not found in any subscribed artifactory.',
			)
		} else {
			throw new Error("expected missing_dependency")
		}
	})

	it("fails with version_conflict naming both requiring edges", () => {
		const catalog = [
			entry(
				"main",
				app("a", "1.0.0", [
					pkg("a", "1.0.0", { dependencies: ["b", "c"] }),
					pkg("b", "1.0.0", { dependencies: ["d@^1.0.0"] }),
					pkg("c", "1.0.0", { dependencies: ["d@^2.0.0"] }),
					pkg("d", "1.0.0"),
					pkg("d", "2.0.0"),
				]),
			),
		]

		const result = resolveApp(catalog, request("a"))

		expect(result.ok).toBe(false)
		if (!result.ok && result.error.type === "version_conflict") {
			expect(result.error.name).toBe("d")
			expect(result.error.edges).toEqual([
				{ dependency: "d", from: "b", range: "^1.0.0" },
				{ dependency: "d", from: "c", range: "^2.0.0" },
			])
		} else {
			throw new Error("expected version_conflict")
		}
	})
})
