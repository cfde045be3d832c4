/**
 * Folder-safe slug for a task description:
 * "Create a project in Linear!" → "create-a-project-in-linear".
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\w\s-]/g, '')
    .replace(/[-\s]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/** Zero-padded capture index: 7 → "007". */
export function padIndex(index: number, width = 3): string {
  return String(index).padStart(width, '0');
}
