/**
 * Inference heuristics for document sections
 *
 * Each rule is a named predicate over the lower-cased prose: it fires when any
 * of its stems occurs as a substring, so "user" also catches "users" and
 * "fail" catches "failure".
 */

export interface InferenceRule {
  name: string;
  stems: readonly string[];
  line: string;
}

export type Domain = 'api' | 'auth' | 'math' | 'data' | 'io' | 'test' | 'user' | 'domain';

const DOMAIN_RULES: ReadonlyArray<{ domain: Domain; stems: readonly string[] }> = [
  { domain: 'api', stems: ['api', 'endpoint'] },
  { domain: 'auth', stems: ['auth', 'login', 'password'] },
  { domain: 'math', stems: ['math', 'sum', 'calculate'] },
  { domain: 'data', stems: ['database', 'store', 'persist'] },
  { domain: 'io', stems: ['file', 'read', 'write'] },
  { domain: 'test', stems: ['test', 'assert', 'expect'] },
  { domain: 'user', stems: ['user'] },
];

export const TYPE_RULES: readonly InferenceRule[] = [
  { name: 'natural', stems: ['number', 'integer', 'count'], line: 'ℕ≜natural_numbers' },
  { name: 'string', stems: ['string', 'text', 'name'], line: '𝕊≜strings' },
  { name: 'boolean', stems: ['bool', 'flag', 'true', 'false'], line: '𝔹≜booleans' },
  { name: 'function', stems: ['function', 'lambda'], line: 'Fn⟨A,B⟩≜A→B' },
  { name: 'user', stems: ['user'], line: 'User≜⟨id:ℕ,name:𝕊⟩' },
  { name: 'list', stems: ['list', 'array'], line: 'List⟨T⟩≜⟨items:T*⟩' },
];

export const RULE_RULES: readonly InferenceRule[] = [
  { name: 'immutable', stems: ['constant', 'immutable'], line: '∀c∈Const:c.immutable≡⊤' },
  { name: 'validity', stems: ['valid', 'check'], line: '∀x:T:valid(x)⇒accept(x)' },
  { name: 'universal', stems: ['all', 'every'], line: '∀x∈S:P(x)' },
  { name: 'requirement', stems: ['must', 'require'], line: '∀x:T:require(x)⇒proceed(x)' },
  { name: 'uniqueness', stems: ['unique'], line: '∃!x:T:unique(x)' },
  { name: 'admin', stems: ['admin'], line: '∀u∈User:u.admin≡⊤⇒allow(u)' },
  { name: 'invariant', stems: ['invariant', 'always true'], line: 'Inv(s)≜always(s)' },
  { name: 'precondition', stems: ['precondition', 'before'], line: 'Pre(f)≜req(args)' },
  { name: 'postcondition', stems: ['postcondition', 'after', 'ensures'], line: 'Post(f)≜guarantee(result)' },
  { name: 'delta', stems: ['delta', 'change'], line: "Δ(s)≜s'−s" },
];

export const ERROR_RULES: readonly InferenceRule[] = [
  { name: 'generic', stems: ['error', 'exception'], line: 'E≜GenericError' },
  { name: 'failure', stems: ['fail'], line: 'fail(x)⇒⊥' },
  { name: 'crash', stems: ['crash', 'panic'], line: 'crash⇒⊥⊥' },
  { name: 'not-found', stems: ['not found', 'missing'], line: 'NotFound⇒∅' },
  { name: 'auth', stems: ['unauthorized', 'forbidden', 'denied'], line: 'AuthError⇒⊘' },
];

export const TYPE_FALLBACK = 'T≜⟨value:Any⟩';
export const RULE_FALLBACK = '∀x:T:⊤';
export const ERROR_FALLBACK = '∅';

export function mentions(prose: string, stems: readonly string[]): boolean {
  const lower = prose.toLowerCase();
  return stems.some(stem => lower.includes(stem));
}

export function extractDomain(prose: string): Domain {
  const match = DOMAIN_RULES.find(rule => mentions(prose, rule.stems));
  return match?.domain ?? 'domain';
}

/**
 * Lines of every rule that fires, or the fallback when none does
 */
export function applyRules(prose: string, rules: readonly InferenceRule[], fallback: string): string[] {
  const lines = rules.filter(rule => mentions(prose, rule.stems)).map(rule => rule.line);
  return lines.length > 0 ? lines : [fallback];
}

export function inferTypes(prose: string): string[] {
  return applyRules(prose, TYPE_RULES, TYPE_FALLBACK);
}

export function inferRules(prose: string): string[] {
  return applyRules(prose, RULE_RULES, RULE_FALLBACK);
}

export function inferErrors(prose: string): string[] {
  return applyRules(prose, ERROR_RULES, ERROR_FALLBACK);
}
