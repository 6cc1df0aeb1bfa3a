/**
 * Parse AGENT_LABELS ("fleet=web,env=production") into a label set.
 * Entries without '=' or with an empty key are skipped.
 */
export function parseLabels(raw: string | undefined): Record<string, string> {
  const labels: Record<string, string> = {};
  for (const entry of (raw ?? '').split(',')) {
    const separator = entry.indexOf('=');
    if (separator <= 0) continue;
    const key = entry.slice(0, separator).trim();
    if (!key) continue;
    labels[key] = entry.slice(separator + 1).trim();
  }
  return labels;
}
