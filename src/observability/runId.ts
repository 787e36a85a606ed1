export function createRunId(profile?: string, now = new Date()): string {
  const suffix = Math.random().toString(36).slice(2, 8);
  const prefix = profile ? `run_${profile.replace(/[^A-Za-z0-9_-]/g, "_")}` : "run";
  return `${prefix}_${now.toISOString().replace(/[:.]/g, "-")}_${suffix}`;
}
