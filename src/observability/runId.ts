export function createRunId(command: string, now = new Date()): string {
  const suffix = Math.random().toString(36).slice(2, 8);
  return `${command}_${now.toISOString().replace(/[:.]/g, "-")}_${suffix}`;
}
