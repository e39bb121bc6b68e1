import { readFileSync } from 'node:fs';
import { z } from 'zod';

/**
 * Topic Gate
 *
 * Two static rule tables evaluated against the lower-cased raw query:
 * 1. Banned rules: any match refuses. Checked first and absolute.
 * 2. Allowed rules: at least one must match, otherwise refuse.
 *
 * Pure boolean gates, no scoring. Rule order carries no meaning.
 */

export type BannedCategory = 'clinical' | 'advice' | 'comparison' | 'contemporary';
export type AllowedCategory = 'movement' | 'thinker' | 'vocabulary' | 'concept';

export interface TopicRule<C extends string = string> {
  pattern: RegExp;
  category: C;
}

const BannedRuleSchema = z.object({
  pattern: z.string().min(1),
  category: z.enum(['clinical', 'advice', 'comparison', 'contemporary']),
});

const AllowedRuleSchema = z.object({
  pattern: z.string().min(1),
  category: z.enum(['movement', 'thinker', 'vocabulary', 'concept']),
});

const RuleTableSchema = z.object({
  banned: z.array(BannedRuleSchema).min(1),
  allowed: z.array(AllowedRuleSchema).min(1),
});

function compile<C extends string>(rules: { pattern: string; category: C }[]): TopicRule<C>[] {
  // No global flag: RegExp.test must stay stateless across queries.
  return rules.map((rule) => ({ pattern: new RegExp(rule.pattern), category: rule.category }));
}

const rawRules: unknown = JSON.parse(
  readFileSync(new URL('../../data/topic-rules.json', import.meta.url), 'utf-8')
);
const ruleTable = RuleTableSchema.parse(rawRules);

export const BANNED_QUERY_RULES: readonly TopicRule<BannedCategory>[] = compile(ruleTable.banned);
export const ALLOWED_TOPIC_RULES: readonly TopicRule<AllowedCategory>[] = compile(ruleTable.allowed);

export function hasBannedTerms(query: string): boolean {
  const q = query.toLowerCase();
  return BANNED_QUERY_RULES.some((rule) => rule.pattern.test(q));
}

export function isInAllowedDomain(query: string): boolean {
  const q = query.toLowerCase();
  return ALLOWED_TOPIC_RULES.some((rule) => rule.pattern.test(q));
}

/**
 * True when the query must be refused before retrieval runs.
 */
export function isRefused(query: string): boolean {
  if (hasBannedTerms(query)) {
    return true;
  }
  return !isInAllowedDomain(query);
}

/**
 * Every rule the query matches, for logging which rules fired.
 */
export function matchTopicRules(query: string): {
  banned: TopicRule<BannedCategory>[];
  allowed: TopicRule<AllowedCategory>[];
} {
  const q = query.toLowerCase();
  return {
    banned: BANNED_QUERY_RULES.filter((rule) => rule.pattern.test(q)),
    allowed: ALLOWED_TOPIC_RULES.filter((rule) => rule.pattern.test(q)),
  };
}
