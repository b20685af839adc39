/**
 * Resolver
 *
 * Turns an app request into a dependency-ordered install plan against a merged
 * catalog. Pure: no I/O, and identical input yields an identical plan.
 *
 * Dependencies are walked depth-first with an explicit stack. Every name is
 * resolved once; later requirements on a resolved name must be satisfied by
 * the chosen version. When one is not but some other candidate satisfies all
 * requirements seen so far, the walk restarts with those requirements pinned.
 * A requirement belongs to one version of the requiring package and is ignored
 * once the walk has chosen another version of it. The pinned set only grows,
 * so restarts terminate.
 */

import { satisfies } from "semver"
import { formatRequirement } from "../schema/dependency"
import type {
	DependencyCycleError,
	MissingDependencyError,
	NotFoundError,
	RequirementEdge,
	ResolveError,
	Result,
	VersionConflictError,
} from "../types/error"
import {
	type AppRequest,
	type CatalogEntry,
	type IndexedPackage,
	type PackageIndex,
	buildPackageIndex,
	comparePreference,
	formatAppRequest,
	formatCandidate,
	lookupApp,
	toCandidate,
} from "./catalog"
import { resolveLocator } from "./locator"

export interface PlannedPackage extends IndexedPackage {
	/** Names of the packages that depend on this one; empty for the root. */
	readonly requiredBy: readonly string[]
}

export interface ResolutionPlan {
	readonly entry: CatalogEntry
	/** Dependencies first, root package last. */
	readonly packages: readonly PlannedPackage[]
}

interface Requirement {
	readonly from: string
	readonly fromVersion: string
	readonly range?: string
}

type Requirements = ReadonlyMap<string, readonly Requirement[]>

type WalkOutcome =
	| { type: "done"; result: Result<PlannedPackage[], ResolveError> }
	| { type: "restart"; requirements: Requirements }

export function resolveApp(
	entries: readonly CatalogEntry[],
	request: AppRequest,
): Result<ResolutionPlan, ResolveError> {
	const lookup = lookupApp(entries, request)
	if (lookup.type === "missing") {
		return notFound(request)
	}
	if (lookup.type === "ambiguous") {
		const candidates = lookup.candidates.map(toCandidate)
		return {
			error: {
				candidates,
				message: `App "${request.name}" is offered by several sources: ${candidates.map(formatCandidate).join(", ")}.`,
				name: request.name,
				type: "ambiguous_app",
			},
			ok: false,
		}
	}

	const entry = lookup.entry
	const root = selectRoot(entry)
	if (!root) {
		return notFound(request)
	}

	const index = buildPackageIndex(entries)
	let pinned: Requirements = new Map()
	for (;;) {
		const outcome = walk(root, index, pinned)
		if (outcome.type === "restart") {
			pinned = outcome.requirements
			continue
		}
		if (!outcome.result.ok) {
			return outcome.result
		}
		return { ok: true, value: { entry, packages: outcome.result.value } }
	}
}

/**
 * The root is the app's package named like the app, or any of its packages
 * when none is, chosen by the usual preference.
 */
function selectRoot(entry: CatalogEntry): IndexedPackage | undefined {
	const named = entry.app.packages.filter((pkg) => pkg.name === entry.app.name)
	const pool = named.length > 0 ? named : entry.app.packages

	const candidates: IndexedPackage[] = []
	for (const pkg of pool) {
		const locator = resolveLocator(pkg.source, entry.manifest)
		if (locator) {
			candidates.push({ locator, package: pkg, source: entry.source })
		}
	}

	return candidates.sort(comparePreference)[0]
}

interface Frame {
	readonly node: IndexedPackage
	next: number
}

function walk(root: IndexedPackage, index: PackageIndex, pinned: Requirements): WalkOutcome {
	const requirements = new Map<string, Requirement[]>()
	for (const [name, list] of pinned) {
		requirements.set(name, [...list])
	}

	const chosen = new Map<string, IndexedPackage>([[root.package.name, root]])
	const requiredBy = new Map<string, string[]>()
	const onStack = new Set<string>([root.package.name])
	const stack: Frame[] = [{ next: 0, node: root }]
	const order: PlannedPackage[] = []

	while (stack.length > 0) {
		const frame = stack[stack.length - 1]
		if (!frame) break

		const dependencies = frame.node.package.dependencies
		const dependency = dependencies[frame.next]
		if (!dependency) {
			stack.pop()
			onStack.delete(frame.node.package.name)
			order.push({
				...frame.node,
				requiredBy: requiredBy.get(frame.node.package.name) ?? [],
			})
			continue
		}
		frame.next += 1

		const from = frame.node.package.name
		const name = dependency.name
		const requirement: Requirement = {
			from,
			fromVersion: frame.node.package.version,
			range: dependency.range,
		}
		addRequirement(requirements, name, requirement)
		addRequiredBy(requiredBy, name, from)

		if (onStack.has(name)) {
			return done(cycleError(stack, name))
		}

		const candidates = index.get(name) ?? []
		if (candidates.length === 0) {
			return done(missing(name, from))
		}

		const accumulated = (requirements.get(name) ?? [requirement]).filter((entry) =>
			isActive(entry, chosen),
		)
		const existing = chosen.get(name)
		if (existing) {
			if (meets(existing, requirement)) continue

			if (candidates.some((candidate) => meetsAll(candidate, accumulated))) {
				return { requirements, type: "restart" }
			}
			return done(conflictOrMissing(name, requirement, accumulated, candidates))
		}

		const viable = candidates.filter((candidate) => meetsAll(candidate, accumulated))
		const [selected] = viable.sort(comparePreference)
		if (!selected) {
			return done(conflictOrMissing(name, requirement, accumulated, candidates))
		}

		chosen.set(name, selected)
		onStack.add(name)
		stack.push({ next: 0, node: selected })
	}

	return done({ ok: true, value: order })
}

function done(result: Result<PlannedPackage[], ResolveError>): WalkOutcome {
	return { result, type: "done" }
}

function addRequirement(
	requirements: Map<string, Requirement[]>,
	name: string,
	requirement: Requirement,
): void {
	const list = requirements.get(name) ?? []
	const duplicate = list.some((existing) => sameRequirement(existing, requirement))
	if (!duplicate) {
		list.push(requirement)
	}
	requirements.set(name, list)
}

function addRequiredBy(requiredBy: Map<string, string[]>, name: string, from: string): void {
	const list = requiredBy.get(name) ?? []
	if (!list.includes(from)) {
		list.push(from)
	}
	requiredBy.set(name, list)
}

function sameRequirement(left: Requirement, right: Requirement): boolean {
	return (
		left.from === right.from && left.fromVersion === right.fromVersion && left.range === right.range
	)
}

/** Requirements of a version the walk did not choose no longer apply. */
function isActive(requirement: Requirement, chosen: ReadonlyMap<string, IndexedPackage>): boolean {
	const node = chosen.get(requirement.from)
	return node === undefined || node.package.version === requirement.fromVersion
}

function meets(candidate: IndexedPackage, requirement: Requirement): boolean {
	return requirement.range === undefined || satisfies(candidate.package.version, requirement.range)
}

function meetsAll(candidate: IndexedPackage, requirements: readonly Requirement[]): boolean {
	return requirements.every((requirement) => meets(candidate, requirement))
}

function cycleError(stack: readonly Frame[], name: string): Result<never, DependencyCycleError> {
	const path: string[] = stack.map((frame) => frame.node.package.name)
	const start = path.indexOf(name)
	const cycle = [...path.slice(start), name]
	return {
		error: {
			cycle,
			message: `Dependency cycle: ${cycle.join(" -> ")}.`,
			type: "dependency_cycle",
		},
		ok: false,
	}
}

function missing(
	name: string,
	requiredBy: string,
	range?: string,
): Result<never, MissingDependencyError> {
	const requirement = formatRequirement(name, range)
	return {
		error: {
			message: `Package "${requirement}" required by "${requiredBy}" was not found in any subscribed artifactory.`,
			name,
			range,
			requiredBy,
			type: "missing_dependency",
		},
		ok: false,
	}
}

/**
 * No candidate satisfies every requirement on `name`. When no candidate
 * satisfies the newest requirement on its own the dependency is missing;
 * otherwise it conflicts with an earlier requirement.
 */
function conflictOrMissing(
	name: string,
	requirement: Requirement,
	accumulated: readonly Requirement[],
	candidates: readonly IndexedPackage[],
): Result<never, MissingDependencyError | VersionConflictError> {
	if (!candidates.some((candidate) => meets(candidate, requirement))) {
		return missing(name, requirement.from, requirement.range)
	}

	const others = accumulated.filter((other) => !sameRequirement(other, requirement))
	const partner =
		others.find(
			(other) => !candidates.some((candidate) => meetsAll(candidate, [other, requirement])),
		) ?? others[0]
	if (!partner) {
		return missing(name, requirement.from, requirement.range)
	}

	const edges: [RequirementEdge, RequirementEdge] = [
		toEdge(name, partner),
		toEdge(name, requirement),
	]
	return {
		error: {
			edges,
			message: `Version conflict on "${name}": ${edges
				.map((edge) => `${edge.from} requires ${edge.dependency}@${edge.range}`)
				.join(", ")}.`,
			name,
			type: "version_conflict",
		},
		ok: false,
	}
}

function toEdge(name: string, requirement: Requirement): RequirementEdge {
	return { dependency: name, from: requirement.from, range: requirement.range ?? "*" }
}

function notFound(request: AppRequest): Result<never, NotFoundError> {
	return {
		error: {
			message: `App "${formatAppRequest(request)}" was not found in any subscribed artifactory.`,
			target: "app",
			type: "not_found",
		},
		ok: false,
	}
}
