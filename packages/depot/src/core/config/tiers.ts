import path from "node:path"
import type { Config } from "@depot/core"
import { consola } from "consola"
import { copyTree, ensureDir, listDir, safeLstat } from "@/src/core/io/fs"
import type { IoResult } from "@/src/core/io/types"

const log = consola.withTag("tiers")

export interface MirrorReport {
	copied: string[]
	skipped: string[]
}

/**
 * Create the install root, the entry-point directory and any configured
 * scratch tiers.
 */
export async function ensureLayout(config: Config): Promise<IoResult<void>> {
	const dirs = [config.installDir, config.binDir, config.sgoinfreDir, config.goinfreDir]
	for (const dir of dirs) {
		if (!dir) continue
		const created = await ensureDir(dir)
		if (!created.ok) {
			return created
		}
	}
	return { ok: true, value: undefined }
}

/**
 * Copy top-level entries of sgoinfre that goinfre lacks. Entries already in
 * goinfre are left alone.
 */
export async function mirrorScratchTier(config: Config): Promise<IoResult<MirrorReport>> {
	const report: MirrorReport = { copied: [], skipped: [] }
	if (!config.sgoinfreDir || !config.goinfreDir) {
		return { ok: true, value: report }
	}

	const target = await ensureDir(config.goinfreDir)
	if (!target.ok) {
		return target
	}

	const entries = await listDir(config.sgoinfreDir)
	if (!entries.ok) {
		return entries
	}

	for (const entry of entries.value) {
		const destination = path.join(config.goinfreDir, entry)
		const existing = await safeLstat(destination)
		if (!existing.ok) {
			return existing
		}
		if (existing.value) {
			report.skipped.push(entry)
			continue
		}

		const copied = await copyTree(path.join(config.sgoinfreDir, entry), destination)
		if (!copied.ok) {
			return copied
		}
		log.debug(`Mirrored ${entry} into ${config.goinfreDir}.`)
		report.copied.push(entry)
	}

	return { ok: true, value: report }
}
