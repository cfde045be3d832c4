/**
 * Live execution logger for flowshot.
 *
 * All output goes to stderr so stdout stays clean for JSON output.
 * Emoji prefixes give instant visual context in the terminal.
 */

// ── Core write ──────────────────────────────────────────────

let quiet = false;

function write(message: string): void {
  if (quiet) return;
  process.stderr.write(message + '\n');
}

/** Silence all output (tests, `--json` piping). */
export function setQuiet(value: boolean): void {
  quiet = value;
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function action(index: number, total: number, type: string): void {
  write(`\n📋 [${String(index)}/${String(total)}] ${type}`);
}

export function actionResult(success: boolean, message: string): void {
  write(success ? `  ✓ ${message}` : `  ✗ ${message}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(60)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(60)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function captured(index: number, step: string, hash: string): void {
  write(`  📸 Captured state ${String(index)}: ${step} (hash: ${hash.slice(0, 16)}...)`);
}

export function skipped(step: string): void {
  write(`  ⊘ No change detected for: ${step}`);
}

export function planned(actionCount: number, source: string): void {
  write(`🧠 Planner: generated ${String(actionCount)} actions (${source})`);
}

export function login(message: string): void {
  write(`🔐 ${message}`);
}

export function llm(message: string): void {
  write(`🧠 ${message}`);
}
