import type { Action, Decision } from "./types.js";

const SEVERITY: Record<Action, number> = { allow: 0, ask: 1, deny: 2 };

function make(action: Action, reason: string, children: readonly Decision[] = []): Decision {
  return Object.freeze({ action, reason, children: Object.freeze([...children]) });
}

export function allow(reason: string, children?: readonly Decision[]): Decision {
  return make("allow", reason, children);
}

export function ask(reason: string, children?: readonly Decision[]): Decision {
  return make("ask", reason, children);
}

export function deny(reason: string, children?: readonly Decision[]): Decision {
  return make("deny", reason, children);
}

export function decide(action: Action, reason: string): Decision {
  return make(action, reason);
}

export function severity(action: Action): number {
  return SEVERITY[action];
}

/**
 * Combine sibling decisions: the most severe action wins, and the reasons of
 * every decision at that level are joined. An empty set allows.
 */
export function combine(decisions: readonly Decision[]): Decision {
  if (decisions.length === 0) return allow("empty");
  let worst: Action = "allow";
  for (const d of decisions) {
    if (SEVERITY[d.action] > SEVERITY[worst]) worst = d.action;
  }
  const reasons = decisions.filter((d) => d.action === worst).map((d) => d.reason);
  return make(worst, reasons.join(", "), decisions);
}
