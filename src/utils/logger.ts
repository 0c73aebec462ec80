/**
 * Live execution logger for stepqa.
 *
 * All output goes to stderr so stdout stays clean for JSON contract output.
 * Emoji prefixes give instant visual context in the terminal.
 */

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function step(index: number, total: number, description: string): void {
  write(`📋 [${String(index)}/${String(total)}] ${description}`);
}

export function stepResult(
  index: number,
  total: number,
  success: boolean,
  description: string,
): void {
  const icon = success ? '✅' : '❌';
  write(`${icon} [${String(index)}/${String(total)}] ${description}`);
}

export function caseResult(name: string, success: boolean, seconds: number): void {
  const icon = success ? '✅' : '❌';
  write(`${icon} ${name} (${seconds.toFixed(2)}s)`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function browser(message: string): void {
  write(`🌐 ${message}`);
}

export function report(message: string): void {
  write(`📊 ${message}`);
}

// ── Conversation ────────────────────────────────────────────

export type ConversationRole = 'user' | 'assistant' | 'system';

const ROLE_PREFIX: Record<ConversationRole, string> = {
  user: '👤 user',
  assistant: '🤖 assistant',
  system: '⚙️  system',
};

export function conversation(role: ConversationRole, message: string): void {
  write(`\n${ROLE_PREFIX[role]}: ${message}\n`);
}
