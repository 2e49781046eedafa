// Resolves false when the Clipboard API is missing or the write is refused.
export async function copyText(text: string): Promise<boolean> {
  if (!navigator.clipboard) return false
  try {
    await navigator.clipboard.writeText(text)
    return true
  } catch {
    return false
  }
}
