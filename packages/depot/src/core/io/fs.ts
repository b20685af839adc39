import type { Stats } from "node:fs"
import {
	chmod,
	cp,
	lstat,
	mkdir,
	readdir,
	readFile,
	readlink,
	rename,
	rm,
	stat,
	writeFile,
} from "node:fs/promises"
import path from "node:path"
import { type IoResult, ioFailure } from "@/src/core/io/types"
import { errorCode, formatError, toRawError } from "@/src/utils/errors"

export type { IoError, IoResult } from "@/src/core/io/types"

export async function safeStat(targetPath: string): Promise<IoResult<Stats | null>> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(formatError(error), targetPath, "stat", toRawError(error))
	}
}

export async function safeLstat(targetPath: string): Promise<IoResult<Stats | null>> {
	try {
		const stats = await lstat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(formatError(error), targetPath, "lstat", toRawError(error))
	}
}

export async function ensureDir(targetPath: string): Promise<IoResult<void>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (stats.value && !stats.value.isDirectory()) {
		return ioFailure(`Expected directory at ${targetPath}.`, targetPath, "mkdir")
	}

	if (!stats.value) {
		try {
			await mkdir(targetPath, { recursive: true })
		} catch (error) {
			return ioFailure(formatError(error), targetPath, "mkdir", toRawError(error))
		}
	}

	return { ok: true, value: undefined }
}

export async function readFileUtf8(targetPath: string): Promise<IoResult<string>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		return ioFailure(formatError(error), targetPath, "readFile", toRawError(error))
	}
}

export async function readBytes(targetPath: string): Promise<IoResult<Uint8Array>> {
	try {
		const contents = await readFile(targetPath)
		return { ok: true, value: new Uint8Array(contents) }
	} catch (error) {
		return ioFailure(formatError(error), targetPath, "readFile", toRawError(error))
	}
}

/**
 * Write through a sibling temp file and rename it into place, so readers see
 * either the old contents or the new ones.
 */
export async function writeFileAtomic(
	targetPath: string,
	contents: string | Uint8Array,
): Promise<IoResult<void>> {
	const dir = await ensureDir(path.dirname(targetPath))
	if (!dir.ok) {
		return dir
	}

	const tempPath = `${targetPath}.${process.pid}.${Date.now()}.tmp`
	try {
		await writeFile(tempPath, contents)
		await rename(tempPath, targetPath)
		return { ok: true, value: undefined }
	} catch (error) {
		await rm(tempPath, { force: true })
		return ioFailure(formatError(error), targetPath, "writeFile", toRawError(error))
	}
}

export async function removePath(targetPath: string): Promise<IoResult<void>> {
	try {
		await rm(targetPath, { force: true, recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(formatError(error), targetPath, "rm", toRawError(error))
	}
}

export async function readLink(targetPath: string): Promise<IoResult<string>> {
	try {
		const target = await readlink(targetPath)
		return { ok: true, value: path.resolve(path.dirname(targetPath), target) }
	} catch (error) {
		return ioFailure(formatError(error), targetPath, "readlink", toRawError(error))
	}
}

export async function makeExecutable(targetPath: string): Promise<IoResult<void>> {
	try {
		const stats = await stat(targetPath)
		await chmod(targetPath, stats.mode | 0o111)
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(formatError(error), targetPath, "chmod", toRawError(error))
	}
}

export async function listDir(targetPath: string): Promise<IoResult<string[]>> {
	try {
		const entries = await readdir(targetPath)
		return { ok: true, value: entries.sort() }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: [] }
		}
		return ioFailure(formatError(error), targetPath, "readdir", toRawError(error))
	}
}

export async function copyTree(source: string, destination: string): Promise<IoResult<void>> {
	try {
		await cp(source, destination, { errorOnExist: true, force: false, recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(formatError(error), destination, "copy", toRawError(error))
	}
}

function isNotFound(error: unknown): boolean {
	return errorCode(error) === "ENOENT"
}
