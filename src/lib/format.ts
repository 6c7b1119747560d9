/** `2024-03-01T00:00:00.000Z` → `2024-03-01`; output stays locale and timezone independent. */
export const formatDate = (iso: string): string => iso.slice(0, 10);
