import { describe, expect, it } from "vitest"
import { parseArtifactory } from "./parse"
import { serializeArtifactory } from "./write"

const SOURCE = "/srv/main/artifactory.toml"
const HASH = "ab".repeat(32)

const MANIFEST = `
name = "main"
description = "Main artifactory"
public = true
maintainer = "ops"
artifactory_handler_version = 1

[[apps]]
name = "hello"
version = "1.0.0"
license = "MIT"
description = "Says hello"
app_handler_version = 1

[[apps.commands]]
command = "hello"
path = "./bin/hello"

[[apps.packages]]
name = "hello"
version = "1.0.0"
sha256 = "${HASH}"
license = "MIT"
source = "packages/hello-1.0.0.tar.gz"
dependencies = ["libgreet@^1.0.0", "libc"]
package_handler_version = 1

[[apps.packages]]
name = "libgreet"
version = "1.2.0"
sha256 = "${HASH}"
license = "MIT"
source = "packages/libgreet-1.2.0.tar.gz"
dependencies = []
package_handler_version = 1
`

describe("parseArtifactory", () => {
	it("parses a manifest into branded entities", () => {
		const result = parseArtifactory(MANIFEST, SOURCE)

		expect(result.ok).toBe(true)
		if (!result.ok) return

		const artifactory = result.value
		expect(artifactory.name).toBe("main")
		expect(artifactory.public).toBe(true)
		expect(artifactory.apps).toHaveLength(1)

		const app = artifactory.apps[0]
		expect(app?.commands).toEqual([{ command: "hello", path: "bin/hello" }])
		expect(app?.packages.map((pkg) => pkg.name)).toEqual(["hello", "libgreet"])
		expect(app?.packages[0]?.dependencies).toEqual([
			{ name: "libgreet", range: "^1.0.0", raw: "libgreet@^1.0.0" },
			{ name: "libc", raw: "libc" },
		])
	})

	it("survives a serialize and parse round trip", () => {
		const first = parseArtifactory(MANIFEST, SOURCE)
		if (!first.ok) {
			throw new Error(first.error.message)
		}

		const second = parseArtifactory(serializeArtifactory(first.value), SOURCE)

		expect(second).toEqual(first)
	})

	it("upgrades version 0 entities before validating them", () => {
		const result = parseArtifactory(
			`
name = "old"
artifactory_handler_version = 0

[[apps]]
name = "tool"
version = "0.1.0"
license = "MIT"
app_handler_version = 0

[[apps.packages]]
name = "tool"
version = "0.1.0"
sha256 = "${HASH.toUpperCase()}"
license = "MIT"
source = "tool.tar.gz"
package_handler_version = 0
`,
			SOURCE,
		)

		expect(result.ok).toBe(true)
		if (!result.ok) return

		expect(result.value).toMatchObject({
			description: "",
			handlerVersion: 1,
			maintainer: "",
			public: false,
		})
		expect(result.value.apps[0]).toMatchObject({
			commands: [],
			description: "",
			handlerVersion: 1,
		})
		expect(result.value.apps[0]?.packages[0]).toMatchObject({
			dependencies: [],
			handlerVersion: 1,
			sha256: HASH,
		})
	})

	it("rejects an unknown artifactory handler version", () => {
		const result = parseArtifactory(
			'name = "future"\nartifactory_handler_version = 2\n',
			SOURCE,
		)

		expect(result.ok).toBe(false)
		if (!result.ok && result.error.type === "unsupported_schema") {
			expect(result.error.entity).toBe("artifactory")
			expect(result.error.version).toBe(2)
			expect(result.error.message).toBe(
				"artifactory: unsupported artifactory handler version 2 (supported: 0, 1).",
			)
		} else {
			throw new Error("expected unsupported_schema")
		}
	})

	it("rejects an unknown package handler version with its location", () => {
		const result = parseArtifactory(
			MANIFEST.replace(
				'dependencies = []\npackage_handler_version = 1',
				"dependencies = []\npackage_handler_version = 7",
			),
			SOURCE,
		)

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("unsupported_schema")
			expect(result.error.message).toBe(
				"apps[0].packages[1]: unsupported package handler version 7 (supported: 0, 1).",
			)
		}
	})

	it("rejects a manifest without a handler version", () => {
		const result = parseArtifactory('name = "bare"\n', SOURCE)

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("validation")
			expect(result.error.message).toBe("artifactory: missing artifactory_handler_version.")
		}
	})

	it("rejects invalid TOML", () => {
		const result = parseArtifactory('name = "broken', SOURCE)

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("parse")
			expect(result.error.message).toContain("Invalid TOML")
		}
	})

	it("rejects unknown keys", () => {
		const result = parseArtifactory(`${MANIFEST.trimEnd()}\nextra = true\n`, SOURCE)

		expect(result.ok).toBe(false)
		if (!result.ok && result.error.type === "validation") {
			expect(result.error.source).toBe("zod")
			expect(result.error.path).toBe(SOURCE)
		} else {
			throw new Error("expected validation")
		}
	})

	it("rejects duplicate apps", () => {
		const app = MANIFEST.slice(MANIFEST.indexOf("[[apps]]"))
		const result = parseArtifactory(`${MANIFEST}\n${app}`, SOURCE)

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.message).toBe('Duplicate app "hello@1.0.0" in artifactory "main".')
		}
	})

	it("rejects command paths that escape the package", () => {
		const result = parseArtifactory(
			MANIFEST.replace('path = "./bin/hello"', 'path = "../bin/hello"'),
			SOURCE,
		)

		expect(result.ok).toBe(false)
		if (!result.ok && result.error.type === "validation") {
			expect(result.error.field).toBe("apps[0].commands[0].path")
		} else {
			throw new Error("expected validation")
		}
	})

	it("rejects a malformed sha256", () => {
		const result = parseArtifactory(MANIFEST.replaceAll(HASH, "abc"), SOURCE)

		expect(result.ok).toBe(false)
		if (!result.ok && result.error.type === "validation") {
			expect(result.error.field).toBe("apps[0].packages[0].sha256")
		} else {
			throw new Error("expected validation")
		}
	})

	it("rejects a malformed dependency range", () => {
		const result = parseArtifactory(
			MANIFEST.replace('"libc"]', '"libc@not a range!"]'),
			SOURCE,
		)

		expect(result.ok).toBe(false)
		if (!result.ok && result.error.type === "validation") {
			expect(result.error.field).toBe("apps[0].packages[0].dependencies[1]")
		} else {
			throw new Error("expected validation")
		}
	})
})
