import { symlink, unlink } from "node:fs/promises"
import type { AbsolutePath } from "@depot/core"
import { makeExecutable, readLink, safeLstat } from "@/src/core/io/fs"
import { type IoResult, ioFailure } from "@/src/core/io/types"
import { formatError, toRawError } from "@/src/utils/errors"

export type EntryPointState =
	| { type: "absent" }
	| { type: "link"; target: string }
	| { type: "file" }

/** Exposes package commands on the command search path. */
export interface EntryPointPublisher {
	inspect(entryPoint: AbsolutePath): Promise<IoResult<EntryPointState>>
	/** Create or replace the entry point so it runs `target`. */
	publish(entryPoint: AbsolutePath, target: AbsolutePath): Promise<IoResult<void>>
	unpublish(entryPoint: AbsolutePath): Promise<IoResult<void>>
}

/**
 * Entry points as symlinks; the target is made executable.
 */
export function createSymlinkPublisher(): EntryPointPublisher {
	return {
		async inspect(entryPoint) {
			const stats = await safeLstat(entryPoint)
			if (!stats.ok) return stats
			if (!stats.value) return { ok: true, value: { type: "absent" } }
			if (!stats.value.isSymbolicLink()) return { ok: true, value: { type: "file" } }

			const target = await readLink(entryPoint)
			if (!target.ok) return target
			return { ok: true, value: { target: target.value, type: "link" } }
		},

		async publish(entryPoint, target) {
			const executable = await makeExecutable(target)
			if (!executable.ok) return executable

			const existing = await safeLstat(entryPoint)
			if (!existing.ok) return existing

			try {
				if (existing.value) {
					await unlink(entryPoint)
				}
				await symlink(target, entryPoint)
				return { ok: true, value: undefined }
			} catch (error) {
				return ioFailure(formatError(error), entryPoint, "symlink", toRawError(error))
			}
		},

		async unpublish(entryPoint) {
			try {
				await unlink(entryPoint)
				return { ok: true, value: undefined }
			} catch (error) {
				return ioFailure(formatError(error), entryPoint, "unlink", toRawError(error))
			}
		},
	}
}
