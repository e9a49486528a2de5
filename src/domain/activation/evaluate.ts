import { prepareHistory } from './history.js';
import type { HistoryEvent, TimedEvent } from './history.js';
import { validateRule } from './validate.js';
import type {
  ActivationRule,
  ActivationTrace,
  ActivationVerdict,
  CompositeRule,
  MatchedEvent,
  SequenceRule,
  SingleEventRule,
} from './types.js';

const MS_PER_HOUR = 3_600_000;

/** Internal outcome of one rule node: activation time (epoch ms) and matched history indexes. */
interface NodeOutcome {
  readonly at: number | null;
  readonly matched: readonly number[];
  readonly children?: readonly NodeOutcome[];
  readonly rule: ActivationRule;
}

function evaluateSingleEvent(rule: SingleEventRule, history: readonly TimedEvent[]): NodeOutcome {
  const index = history.findIndex((entry) => entry.event.name === rule.event_name);
  const entry = history[index];
  if (entry === undefined) {
    return { rule, at: null, matched: [] };
  }
  return { rule, at: entry.at, matched: [index] };
}

/**
 * Greedy in-order match of `rule.events` starting at history index `anchor`.
 *
 * Each history entry is consumed at most once. Stops as soon as the next
 * entry falls outside the window opened by the anchor.
 */
function matchFromAnchor(
  rule: SequenceRule,
  history: readonly TimedEvent[],
  anchor: number,
  windowMs: number,
): { matched: number[]; exhausted: boolean } {
  const start = history[anchor]?.at ?? 0;
  const matched = [anchor];
  let next = 1;
  let cursor = anchor + 1;

  while (next < rule.events.length) {
    const entry = history[cursor];
    if (entry === undefined) {
      return { matched, exhausted: true };
    }
    if (entry.at - start > windowMs) break;
    if (entry.event.name === rule.events[next]) {
      matched.push(cursor);
      next++;
    }
    cursor++;
  }

  return { matched, exhausted: false };
}

/**
 * Sequence evaluation.
 *
 * Tries each event matching `events[0]` as the window anchor, oldest first.
 * A match that overruns the window is discarded and the search resumes at
 * the next anchor, so a later and faster completion is still found. The
 * first anchor that completes gives the earliest completion. Once a greedy
 * scan runs out of history no later anchor can complete either.
 */
function evaluateSequence(rule: SequenceRule, history: readonly TimedEvent[]): NodeOutcome {
  const windowMs = rule.time_window_hours * MS_PER_HOUR;

  for (let anchor = 0; anchor < history.length; anchor++) {
    if (history[anchor]?.event.name !== rule.events[0]) continue;

    const { matched, exhausted } = matchFromAnchor(rule, history, anchor, windowMs);
    if (matched.length === rule.events.length) {
      const last = history[matched[matched.length - 1] ?? anchor];
      return { rule, at: last?.at ?? null, matched };
    }
    if (exhausted) break;
  }

  return { rule, at: null, matched: [] };
}

function evaluateComposite(rule: CompositeRule, history: readonly TimedEvent[]): NodeOutcome {
  const children = rule.sub_rules.map((child) => evaluateNode(child, history));
  const activated = children.filter((child) => child.at !== null);

  if (rule.operator === 'AND') {
    if (activated.length !== children.length) {
      return { rule, at: null, matched: [], children };
    }
    const at = Math.max(...activated.map((child) => child.at ?? -Infinity));
    const matched = [...new Set(children.flatMap((child) => child.matched))].sort((a, b) => a - b);
    return { rule, at, matched, children };
  }

  // OR: the earliest activated child decides.
  let earliest: NodeOutcome | undefined;
  for (const child of activated) {
    if (earliest === undefined || (child.at ?? Infinity) < (earliest.at ?? Infinity)) {
      earliest = child;
    }
  }
  if (earliest === undefined) {
    return { rule, at: null, matched: [], children };
  }
  return { rule, at: earliest.at, matched: earliest.matched, children };
}

function evaluateNode(rule: ActivationRule, history: readonly TimedEvent[]): NodeOutcome {
  switch (rule.rule_type) {
    case 'single_event':
      return evaluateSingleEvent(rule, history);
    case 'sequence':
      return evaluateSequence(rule, history);
    case 'composite':
      return evaluateComposite(rule, history);
  }
}

function toVerdict(at: number | null): ActivationVerdict {
  if (at === null) {
    return { activated: false, activated_at: null };
  }
  return { activated: true, activated_at: new Date(at).toISOString() };
}

function toTrace(outcome: NodeOutcome, history: readonly TimedEvent[]): ActivationTrace {
  const matched: MatchedEvent[] = [];
  for (const index of outcome.matched) {
    const entry = history[index];
    if (entry === undefined) continue;
    matched.push({
      event_id: entry.event.event_id ?? null,
      name: entry.event.name,
      occurred_at: entry.event.occurred_at,
    });
  }

  const trace: ActivationTrace = {
    ...toVerdict(outcome.at),
    rule_type: outcome.rule.rule_type,
    matched,
  };

  if (outcome.children === undefined) return trace;
  return { ...trace, sub_rules: outcome.children.map((child) => toTrace(child, history)) };
}

/**
 * Explains how a rule classifies one subject's history.
 *
 * Same contract as `evaluate()`; the returned trace additionally lists,
 * per rule node, the events that produced its activation.
 */
export function explain(rule: ActivationRule, events: readonly HistoryEvent[]): ActivationTrace {
  validateRule(rule);
  const history = prepareHistory(events);
  return toTrace(evaluateNode(rule, history), history);
}

/**
 * Evaluates an activation rule against one subject's event history.
 *
 * Pure and synchronous: no I/O, no state kept between calls.
 * - The rule is validated before any scanning; an invalid rule throws
 *   ValidationError and produces no verdict.
 * - The history is re-sorted defensively by `occurred_at` (stable, so
 *   input order breaks ties). Unparseable timestamps or a slice mixing
 *   subjects throw ValidationError.
 * - "Not activated" is a normal verdict, never an error.
 */
export function evaluate(rule: ActivationRule, events: readonly HistoryEvent[]): ActivationVerdict {
  validateRule(rule);
  const history = prepareHistory(events);
  return toVerdict(evaluateNode(rule, history).at);
}
