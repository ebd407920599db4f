import type { ObjectTag } from "../../ports/object-store-client"
import type { TagSet } from "../../ports/object-status"

/** Replaces the value of `name` in place, or appends it. Input is not mutated. */
export function mergeTag(tags: readonly ObjectTag[], name: string, value: string): ObjectTag[] {
  const merged = tags.map((tag) => ({ ...tag }))
  const existing = merged.find((tag) => tag.name === name)

  if (existing) existing.value = value
  else merged.push({ name, value })

  return merged
}

export function toTagSet(tags: readonly ObjectTag[]): TagSet {
  return Object.freeze(Object.fromEntries(tags.map((tag) => [tag.name, tag.value])))
}
