export const MANAGED_DESCRIPTION_PREFIX =
  '[PLAYLIST GENERATED AND MANAGED BY PlaylistRouter]'

/**
 * Remote name of a child playlist, e.g. `[Road Trip] > Slow Songs`
 */
export function buildChildPlaylistName(
  baseName: string,
  childName: string,
): string {
  return `[${baseName}] > ${childName}`
}

export function buildChildPlaylistDescription(description: string): string {
  return `${MANAGED_DESCRIPTION_PREFIX} ${description}`
}
