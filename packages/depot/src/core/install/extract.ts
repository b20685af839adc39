import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import path from "node:path"
import type { AbsolutePath, Result } from "@depot/core"
import { ReadEntry, t, x } from "tar"
import { formatError, toRawError } from "@/src/utils/errors"

/** One archive member as listed before extraction. */
export interface ArchiveEntry {
	path: string
	/** Target of a symbolic or hard link entry. */
	linkpath?: string
}

export interface ExtractorError {
	message: string
	rawError?: Error
}

export interface ArchiveExtractor {
	list(archive: Uint8Array): Promise<Result<ArchiveEntry[], ExtractorError & { type: "extractor" }>>
	extract(
		archive: Uint8Array,
		destination: AbsolutePath,
	): Promise<Result<void, ExtractorError & { type: "extractor" }>>
}

type ExtractorResult<T> = Result<T, ExtractorError & { type: "extractor" }>

/**
 * tar archives, gzip detected from the data.
 */
export function createTarExtractor(): ArchiveExtractor {
	return {
		list: (archive) =>
			withArchiveFile(archive, async (file) => {
				const entries: ArchiveEntry[] = []
				await t({
					file,
					filter: (entryPath, entry) => {
						const linkpath = entry instanceof ReadEntry ? entry.linkpath : undefined
						entries.push(linkpath ? { linkpath, path: entryPath } : { path: entryPath })
						return true
					},
					strict: true,
				})
				return entries
			}),
		extract: (archive, destination) =>
			withArchiveFile(archive, async (file) => {
				await x({ cwd: destination, file, strict: true })
			}),
	}
}

async function withArchiveFile<T>(
	archive: Uint8Array,
	use: (file: string) => Promise<T>,
): Promise<ExtractorResult<T>> {
	let dir: string | undefined
	try {
		dir = await mkdtemp(path.join(tmpdir(), "depot-archive-"))
		const file = path.join(dir, "archive.tar")
		await writeFile(file, archive)
		return { ok: true, value: await use(file) }
	} catch (error) {
		return {
			error: { message: formatError(error), rawError: toRawError(error), type: "extractor" },
			ok: false,
		}
	} finally {
		if (dir) {
			await rm(dir, { force: true, recursive: true })
		}
	}
}
