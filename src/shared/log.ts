/**
 * Step logging in the "  [STEP] message" shape used by the CLI and pipeline.
 * Set ROOF_NOTES_LOG=silent to mute (the test suite does).
 */

function muted(): boolean {
  return process.env.ROOF_NOTES_LOG === "silent";
}

export function logStep(step: string, msg: string): void {
  if (muted()) return;
  console.log(`  [${step}] ${msg}`);
}

export function warnStep(step: string, msg: string): void {
  if (muted()) return;
  console.warn(`  [${step}] ⚠ ${msg}`);
}
