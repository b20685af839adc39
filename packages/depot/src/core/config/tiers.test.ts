import { mkdir, readFile, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { emptyConfig } from "@depot/core"
import { abs } from "@depot/core/testing"
import { describe, expect, it } from "vitest"
import { ensureLayout, mirrorScratchTier } from "@/src/core/config/tiers"
import { exists, withTempDir } from "@/tests/helpers"

function configIn(dir: string) {
	return {
		...emptyConfig({ binDir: abs(join(dir, "bin")), installDir: abs(join(dir, "install")) }),
		goinfreDir: abs(join(dir, "goinfre")),
		sgoinfreDir: abs(join(dir, "sgoinfre")),
	}
}

describe("ensureLayout", () => {
	it("creates every configured directory", async () => {
		await withTempDir(async (dir) => {
			const result = await ensureLayout(configIn(dir))

			expect(result).toBeOk()
			for (const name of ["bin", "install", "goinfre", "sgoinfre"]) {
				expect(await exists(join(dir, name))).toBe(true)
			}
		})
	})
})

describe("mirrorScratchTier", () => {
	it("does nothing when a tier is not configured", async () => {
		await withTempDir(async (dir) => {
			const config = emptyConfig({
				binDir: abs(join(dir, "bin")),
				installDir: abs(join(dir, "install")),
			})

			const result = await mirrorScratchTier(config)

			expect(result).toEqual({ ok: true, value: { copied: [], skipped: [] } })
		})
	})

	it("copies missing entries and leaves existing ones alone", async () => {
		await withTempDir(async (dir) => {
			const config = configIn(dir)
			await mkdir(join(dir, "sgoinfre", "tools", "bin"), { recursive: true })
			await writeFile(join(dir, "sgoinfre", "tools", "bin", "run"), "persistent")
			await writeFile(join(dir, "sgoinfre", "notes.txt"), "persistent")
			await mkdir(join(dir, "goinfre"), { recursive: true })
			await writeFile(join(dir, "goinfre", "notes.txt"), "local")

			const result = await mirrorScratchTier(config)

			expect(result).toEqual({ ok: true, value: { copied: ["tools"], skipped: ["notes.txt"] } })
			expect(await readFile(join(dir, "goinfre", "tools", "bin", "run"), "utf8")).toBe(
				"persistent",
			)
			expect(await readFile(join(dir, "goinfre", "notes.txt"), "utf8")).toBe("local")
		})
	})

	it("treats a missing sgoinfre directory as empty", async () => {
		await withTempDir(async (dir) => {
			const result = await mirrorScratchTier(configIn(dir))

			expect(result).toEqual({ ok: true, value: { copied: [], skipped: [] } })
			expect(await exists(join(dir, "goinfre"))).toBe(true)
		})
	})
})
