/**
 * Run `worker` over `items` with at most `limit` calls in flight. Results keep
 * the order of `items`; items never started because `shouldStop` returned true
 * are left undefined.
 */
export async function mapPool<T, R>(
	items: readonly T[],
	limit: number,
	worker: (item: T, index: number) => Promise<R>,
	shouldStop: () => boolean = () => false,
): Promise<Array<R | undefined>> {
	const results: Array<R | undefined> = new Array(items.length).fill(undefined)
	let next = 0

	const run = async (): Promise<void> => {
		while (next < items.length && !shouldStop()) {
			const index = next
			next += 1
			const item = items[index]
			if (item === undefined) continue
			results[index] = await worker(item, index)
		}
	}

	const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, run)
	await Promise.all(workers)
	return results
}

/**
 * Runs tasks one at a time in submission order. A failed task does not block
 * the ones queued after it.
 */
export class SerialQueue {
	private tail: Promise<unknown> = Promise.resolve()

	run<T>(task: () => Promise<T>): Promise<T> {
		const result = this.tail.then(task, task)
		this.tail = result.catch(() => undefined)
		return result
	}
}
