/**
 * Module `src/detection.ts`: turn one probe response into a verdict outcome.
 */

import type { DetectionRule, HitMissRule, ProbeResponse, RulePolarity, VerdictOutcome } from "./types.js";

export interface Classification {
  outcome: VerdictOutcome;
  detail: string | null;
  confidence: number;
}

export interface RuleDecision {
  outcome: Exclude<VerdictOutcome, "failed">;
  confidence: number;
}

interface ConfidenceScale {
  match: number;
  mismatch: number;
  invertedMatch: number;
  invertedMismatch: number;
}

const STATUS_CONFIDENCE: ConfidenceScale = { match: 70, mismatch: 80, invertedMatch: 90, invertedMismatch: 50 };
const BODY_CONFIDENCE: ConfidenceScale = { match: 90, mismatch: 80, invertedMatch: 100, invertedMismatch: 50 };

/**
 * Classify a response against a site's rule. Pure: the same response and rule
 * always give the same classification.
 */
export function classifyResponse(response: ProbeResponse, rule: DetectionRule): Classification {
  if (response.error) {
    return { outcome: "failed", detail: response.error, confidence: 0 };
  }
  const decision = evaluateRule(rule, response.status, response.body);
  if (decision === null) {
    return { outcome: "failed", detail: "bad-rule", confidence: 0 };
  }
  return { ...decision, detail: `HTTP ${response.status}` };
}

/**
 * Evaluate a rule against a status and body. Returns null for a rule shape the
 * engine does not know.
 */
export function evaluateRule(rule: DetectionRule, status: number, body: string): RuleDecision | null {
  switch (rule.kind) {
    case "status-match":
      return applyPolarity(status === rule.status, rule.polarity, STATUS_CONFIDENCE);
    case "body-contains":
      return applyPolarity(body.includes(rule.text), rule.polarity, BODY_CONFIDENCE);
    case "body-pattern": {
      const matched = testPattern(rule.pattern, rule.flags, body);
      if (matched === null) return null;
      return applyPolarity(matched, rule.polarity, BODY_CONFIDENCE);
    }
    case "absence-of-marker":
      return applyPolarity(body.includes(rule.marker), "not-found-on-match", BODY_CONFIDENCE);
    case "all-of": {
      if (rule.rules.length === 0) return null;
      let weakest = 100;
      let firstMiss: RuleDecision | null = null;
      for (const inner of rule.rules) {
        const decision = evaluateRule(inner, status, body);
        if (decision === null) return null;
        if (decision.outcome === "not-found") {
          firstMiss ??= decision;
        } else {
          weakest = Math.min(weakest, decision.confidence);
        }
      }
      return firstMiss ?? { outcome: "found", confidence: weakest };
    }
    case "hit-miss":
      return evaluateHitMiss(rule, status, body);
    default:
      return unknownRule(rule);
  }
}

function evaluateHitMiss(rule: HitMissRule, status: number, body: string): RuleDecision | null {
  const { hitCode, hitString, missString, missCode } = rule;
  if (hitCode === null && missCode === null && !hitString && !missString) return null;

  if (missString && body.includes(missString)) return notFound(100);
  if (missCode !== null && status === missCode && !hitString) return notFound(90);
  if (hitCode !== null && status === hitCode) {
    if (!hitString) return found(70);
    return body.includes(hitString) ? found(100) : notFound(80);
  }
  if (hitString && body.includes(hitString)) return found(60);
  if (hitCode !== null) return notFound(80);
  if (hitString) return notFound(50);
  // Only miss conditions, and none fired.
  return found(50);
}

function found(confidence: number): RuleDecision {
  return { outcome: "found", confidence };
}

function notFound(confidence: number): RuleDecision {
  return { outcome: "not-found", confidence };
}

function applyPolarity(matched: boolean, polarity: RulePolarity, scale: ConfidenceScale): RuleDecision {
  if (polarity === "not-found-on-match") {
    return matched ? notFound(scale.invertedMatch) : found(scale.invertedMismatch);
  }
  return matched ? found(scale.match) : notFound(scale.mismatch);
}

function testPattern(pattern: string, flags: string | undefined, body: string): boolean | null {
  let expression: RegExp;
  try {
    // Stateful flags dropped.
    expression = new RegExp(pattern, (flags ?? "").replace(/[gy]/g, ""));
  } catch {
    return null;
  }
  return expression.test(body);
}

// Reached only by a rule object that slipped past the loader untyped.
function unknownRule(_rule: never): null {
  return null;
}
