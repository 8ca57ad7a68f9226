/**
 * Picks the singular or plural form of a word for a count
 */
export function pluralize(count: number, singular: string, plural: string): string {
  return count === 1 ? singular : plural
}

/**
 * Renders a list of members for log lines, e.g. `U1, U2`
 */
export function formatMemberList(members: readonly string[]): string {
  return members.length === 0 ? '(none)' : members.join(', ')
}
