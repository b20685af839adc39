import { isCancel, select } from "@clack/prompts"
import { type AppCandidate, formatCandidate } from "@depot/core"

/** Returns the chosen candidate, or null when the prompt was cancelled. */
export type CandidatePicker = (
	message: string,
	candidates: readonly AppCandidate[],
) => Promise<AppCandidate | null>

export const promptCandidate: CandidatePicker = async (message, candidates) => {
	const selected = await select<{ label: string; value: number }[], number>({
		message,
		options: candidates.map((candidate, index) => ({
			label: formatCandidate(candidate),
			value: index,
		})),
	})
	if (isCancel(selected)) {
		return null
	}
	return candidates[selected] ?? null
}
