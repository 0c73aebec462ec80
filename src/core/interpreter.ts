import type { ActionRequest, SelectorProfile } from '../schema/index.js';
import { DEFAULT_SELECTORS, TIMEOUTS } from '../config/defaults.js';

// ── Public types ─────────────────────────────────────────────

export type RuleName =
  | 'navigate'
  | 'search_input'
  | 'click'
  | 'verify'
  | 'wait'
  | 'default';

export interface Interpretation {
  rule: RuleName;
  request: ActionRequest;
}

/**
 * What a rule decided for a step:
 * - `request`: matched, stop here
 * - `next`: not matched, try the following rule
 * - `default`: matched a keyword but cannot build a request; skip
 *   straight to the default no-op
 */
type RuleOutcome =
  | { type: 'request'; request: ActionRequest }
  | { type: 'next' }
  | { type: 'default' };

interface StepRule {
  name: Exclude<RuleName, 'default'>;
  apply(text: string, selectors: SelectorProfile): RuleOutcome;
}

// ── Keywords ─────────────────────────────────────────────────
// Substring matches against the lower-cased step text.

const KEYWORDS = {
  navigate: ['导航', '打开', '访问', 'navigate', 'open', 'visit'],
  search: ['搜索', 'search'],
  input: ['输入', 'input', 'enter'],
  click: ['点击', 'click'],
  button: ['按钮', 'button'],
  verify: ['验证', '检查', 'verify', 'check'],
  title: ['标题', 'title'],
  wait: ['等待', 'wait'],
} as const;

const URL_PATTERN = /https?:\/\/[^\s()[\]（）【】,，。]+/;
const QUOTED_PATTERN = /['"]([^'"]+)['"]/;

function hasAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((k) => text.includes(k));
}

const NEXT: RuleOutcome = { type: 'next' };

function matched(request: ActionRequest): RuleOutcome {
  return { type: 'request', request };
}

// ── Rule chain ───────────────────────────────────────────────
// Order matters: the first rule returning a request wins.

const RULES: readonly StepRule[] = [
  {
    name: 'navigate',
    apply(text) {
      if (!hasAny(text.toLowerCase(), KEYWORDS.navigate)) return NEXT;
      const url = URL_PATTERN.exec(text)?.[0];
      if (url === undefined) return { type: 'default' };
      return matched({ kind: 'navigate', url });
    },
  },
  {
    name: 'search_input',
    apply(text, selectors) {
      const lower = text.toLowerCase();
      if (!hasAny(lower, KEYWORDS.search) || !hasAny(lower, KEYWORDS.input)) {
        return NEXT;
      }
      const term = QUOTED_PATTERN.exec(text)?.[1];
      if (term === undefined) return NEXT;
      return matched({ kind: 'fill', selector: selectors.searchBox, text: term });
    },
  },
  {
    name: 'click',
    apply(text, selectors) {
      const lower = text.toLowerCase();
      if (!hasAny(lower, KEYWORDS.click)) return NEXT;
      const submit = hasAny(lower, KEYWORDS.search) || hasAny(lower, KEYWORDS.button);
      return matched({
        kind: 'click',
        selector: submit ? selectors.submitButton : selectors.clickable,
      });
    },
  },
  {
    name: 'verify',
    apply(text) {
      const lower = text.toLowerCase();
      if (!hasAny(lower, KEYWORDS.verify)) return NEXT;
      if (hasAny(lower, KEYWORDS.title)) return matched({ kind: 'get_title' });
      return matched({ kind: 'wait_fixed', timeout: TIMEOUTS.VERIFY_WAIT });
    },
  },
  {
    name: 'wait',
    apply(text) {
      if (!hasAny(text.toLowerCase(), KEYWORDS.wait)) return NEXT;
      return matched({ kind: 'wait_fixed', timeout: TIMEOUTS.WAIT_STEP });
    },
  },
];

function defaultInterpretation(): Interpretation {
  return {
    rule: 'default',
    request: { kind: 'wait_fixed', timeout: TIMEOUTS.DEFAULT_STEP_WAIT },
  };
}

// ── Public API ───────────────────────────────────────────────

/**
 * Map a step's text to exactly one action, reporting which rule
 * fired. Pure: the same text and profile always give the same result.
 */
export function interpretStep(
  stepText: string,
  selectors: SelectorProfile = DEFAULT_SELECTORS,
): Interpretation {
  for (const rule of RULES) {
    const outcome = rule.apply(stepText, selectors);
    if (outcome.type === 'request') {
      return { rule: rule.name, request: outcome.request };
    }
    if (outcome.type === 'default') break;
  }
  return defaultInterpretation();
}

export function interpret(
  stepText: string,
  selectors: SelectorProfile = DEFAULT_SELECTORS,
): ActionRequest {
  return interpretStep(stepText, selectors).request;
}

/** Bind a selector profile once, e.g. from the config file. */
export function createInterpreter(
  selectors: SelectorProfile,
): (stepText: string) => Interpretation {
  return (stepText) => interpretStep(stepText, selectors);
}
