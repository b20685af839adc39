import { describe, expect, it } from "vitest"
import { abs } from "../testing/builders"
import { emptyConfig, parseConfig, parseManifestSource } from "./parse"
import { parseProviderSpec, providerManifestUrl } from "./provider"
import { serializeConfig } from "./write"

const CONFIG_PATH = abs("/home/user/.config/depot/config.toml")
const DEFAULTS = {
	binDir: abs("/home/user/.local/bin"),
	installDir: abs("/home/user/.local/share/depot/packages"),
}
const HASH = "0f".repeat(32)

const CONFIG = `
config_handler_version = 1
install_dir = "/data/depot"
sgoinfre_dir = "/sgoinfre/user"

[[subscribed_artifactories]]
name = "main"
source = "../artifactories/main.toml"
subscription_handler_version = 1

[[subscribed_artifactories]]
name = "remote"
source = "https://example.test/artifactory.toml"
auto_update = true
subscription_handler_version = 1

[[providers]]
name = "tools"
owner = "acme"
repo = "tools"
ref = "main"
path = "depot/artifactory.toml"
provider_handler_version = 1

[[packages]]
name = "hello"
version = "1.0.0"
sha256 = "${HASH}"
install_path = "/data/depot/hello-1.0.0"
installed_at = "2024-01-01T00:00:00.000Z"
record_handler_version = 1

[[packages.commands]]
app_name = "hello"
app_source = "main"
command = "hello"
path = "bin/hello"
entry_point = "/home/user/.local/bin/hello"

[[packages.apps]]
name = "hello"
source = "main"
`

describe("parseConfig", () => {
	it("parses every section and applies defaults", () => {
		const result = parseConfig(CONFIG, CONFIG_PATH, DEFAULTS)

		expect(result.ok).toBe(true)
		if (!result.ok) return

		const config = result.value
		expect(config.installDir).toBe("/data/depot")
		expect(config.binDir).toBe("/home/user/.local/bin")
		expect(config.sgoinfreDir).toBe("/sgoinfre/user")
		expect(config.goinfreDir).toBeUndefined()
		expect(config.subscriptions.map((subscription) => subscription.source)).toEqual([
			{ path: "/home/user/.config/artifactories/main.toml", type: "local" },
			{ type: "remote", url: "https://example.test/artifactory.toml" },
		])
		expect(config.subscriptions.map((subscription) => subscription.autoUpdate)).toEqual([
			false,
			true,
		])
		expect(config.providers[0]?.github).toEqual({
			owner: "acme",
			path: "depot/artifactory.toml",
			ref: "main",
			repo: "tools",
		})
		expect(config.packages[0]).toEqual({
			apps: [{ name: "hello", source: "main" }],
			commands: [
				{
					app: { name: "hello", source: "main" },
					command: "hello",
					entryPoint: "/home/user/.local/bin/hello",
					path: "bin/hello",
				},
			],
			handlerVersion: 1,
			installPath: "/data/depot/hello-1.0.0",
			installedAt: "2024-01-01T00:00:00.000Z",
			orphaned: false,
			package: { name: "hello", sha256: HASH, version: "1.0.0" },
		})
	})

	it("survives a serialize and parse round trip", () => {
		const first = parseConfig(CONFIG, CONFIG_PATH, DEFAULTS)
		if (!first.ok) {
			throw new Error(first.error.message)
		}

		const second = parseConfig(serializeConfig(first.value), CONFIG_PATH, DEFAULTS)

		expect(second).toEqual(first)
	})

	it("round trips an empty config", () => {
		const empty = emptyConfig(DEFAULTS)

		expect(parseConfig(serializeConfig(empty), CONFIG_PATH, DEFAULTS)).toEqual({
			ok: true,
			value: empty,
		})
	})

	it("upgrades a version 0 config", () => {
		const result = parseConfig("config_handler_version = 0\n", CONFIG_PATH, DEFAULTS)

		expect(result).toEqual({ ok: true, value: emptyConfig(DEFAULTS) })
	})

	it("rejects a config from a newer build", () => {
		const result = parseConfig("config_handler_version = 2\n", CONFIG_PATH, DEFAULTS)

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("unsupported_schema")
		}
	})

	it("rejects a source name used twice", () => {
		const result = parseConfig(
			CONFIG.replace('name = "tools"', 'name = "main"'),
			CONFIG_PATH,
			DEFAULTS,
		)

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.message).toBe('Duplicate source name "main".')
		}
	})

	it("rejects a relative install_dir", () => {
		const result = parseConfig(
			CONFIG.replace('install_dir = "/data/depot"', 'install_dir = "data"'),
			CONFIG_PATH,
			DEFAULTS,
		)

		expect(result.ok).toBe(false)
		if (!result.ok && result.error.type === "validation") {
			expect(result.error.field).toBe("install_dir")
		} else {
			throw new Error("expected validation")
		}
	})
})

describe("parseManifestSource", () => {
	it("treats http(s) sources as remote", () => {
		expect(parseManifestSource("HTTPS://example.test/a.toml", "/tmp")).toEqual({
			type: "remote",
			url: "HTTPS://example.test/a.toml",
		})
	})

	it("resolves local sources against the base directory", () => {
		expect(parseManifestSource("a.toml", "/tmp/x")).toEqual({
			path: "/tmp/x/a.toml",
			type: "local",
		})
	})
})

describe("parseProviderSpec", () => {
	it("parses github specs and builds the raw manifest URL", () => {
		const result = parseProviderSpec("github:acme/tools@v1.0:depot/artifactory.toml")

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(providerManifestUrl(result.value)).toBe(
				"https://raw.githubusercontent.com/acme/tools/v1.0/depot/artifactory.toml",
			)
		}
	})

	it("rejects specs without a ref", () => {
		expect(parseProviderSpec("github:acme/tools:artifactory.toml").ok).toBe(false)
	})

	it("rejects paths that escape the repository", () => {
		const result = parseProviderSpec("github:acme/tools@main:../x.toml")

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.message).toBe(
				'Invalid provider path in "github:acme/tools@main:../x.toml": Path must not escape its root.',
			)
		}
	})
})
