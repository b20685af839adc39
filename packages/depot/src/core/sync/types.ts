import type { AppRef, DepotError } from "@depot/core"
import type { PackageAction } from "@/src/core/install/app"
import type { CatalogFailure } from "@/src/core/subscriptions/manager"

export type SyncStage = "resolve" | "fetch" | "install" | "orphan"

export interface SyncFailure {
	app: AppRef
	stage: SyncStage
	error: DepotError
}

export interface AppSyncOutcome {
	app: AppRef
	actions: PackageAction[]
}

export interface SyncSummary {
	dryRun: boolean
	apps: AppSyncOutcome[]
	installed: number
	upgraded: number
	detached: number
	orphaned: AppRef[]
	failures: SyncFailure[]
	catalogFailures: CatalogFailure[]
}

export interface SyncOptions {
	dryRun: boolean
	allOrNothing?: boolean
	signal?: AbortSignal
}
