import type { AppRef, DepotError } from "@depot/core"
import type { SyncFailure, SyncStage } from "@/src/core/sync/types"

export function toSyncFailure(app: AppRef, error: DepotError, stage?: SyncStage): SyncFailure {
	return { app, error, stage: stage ?? stageOf(error) }
}

export function stageOf(error: DepotError): SyncStage {
	switch (error.type) {
		case "not_found":
		case "ambiguous_app":
		case "dependency_cycle":
		case "missing_dependency":
		case "version_conflict":
			return "resolve"
		case "network":
		case "integrity_failure":
		case "fetch_timeout":
			return "fetch"
		case "aborted":
			return error.stage === "fetch" ? "fetch" : "install"
		default:
			return "install"
	}
}
