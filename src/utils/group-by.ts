export function groupBy<T>(items: Iterable<T>, keyOf: (item: T) => string) {
	const groups = new Map<string, T[]>();
	for (const item of items) {
		const key = keyOf(item);
		const group = groups.get(key);
		if (typeof group === "undefined") groups.set(key, [item]);
		else group.push(item);
	}
	return groups;
}
