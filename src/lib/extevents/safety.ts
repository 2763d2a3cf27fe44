export interface StoredEventShape {
  parentId: string | null
}

/**
 * Whether a freshly fetched batch may replace the stored events of a source.
 *
 * A batch that is not smaller is always fine, an empty one replacing events
 * never is. Otherwise the new batch must hold at least half as many events as
 * the stored ones that are not instances of a recurring series: one edited
 * series rule upstream can legitimately collapse many instances.
 */
export function isSafe(
  oldEvents: readonly StoredEventShape[],
  newEvents: readonly unknown[]
): boolean {
  if (newEvents.length >= oldEvents.length) return true
  if (newEvents.length === 0) return false

  const nonRecurring = oldEvents.filter(event => event.parentId === null).length
  return newEvents.length * 2 >= nonRecurring
}
