/**
 * Document templates - wrap the symbolic body in tier scaffolding
 */

import type { Domain } from './inference.js';

export const NOTATION_VERSION = '5.1';

export const BLOCKS = {
  META: '⟦Ω:Meta⟧',
  TYPES: '⟦Σ:Types⟧',
  RULES: '⟦Γ:Rules⟧',
  FUNCS: '⟦Λ:Funcs⟧',
  ERRORS: '⟦Χ:Errors⟧',
  EVIDENCE: '⟦Ε⟧',
} as const;

export interface StandardDocumentInput {
  domain: Domain;
  date: string;
  body: string;
}

export interface FullDocumentInput extends StandardDocumentInput {
  types: readonly string[];
  rules: readonly string[];
  errors: readonly string[];
}

/**
 * YYYY-MM-DD in UTC
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function indent(lines: readonly string[]): string {
  return lines.map(line => `  ${line}`).join('\n');
}

function block(name: string, content: string): string {
  return `${name}{\n${content}\n}`;
}

export function renderStandard({ domain, date, body }: StandardDocumentInput): string {
  return [
    `𝔸${NOTATION_VERSION}.${domain}@${date}\nγ≔${domain}`,
    block(BLOCKS.META, indent([`domain≜${domain}`, 'version≜1.0.0'])),
    block(BLOCKS.TYPES, indent(['∅'])),
    block(BLOCKS.RULES, indent(['∅'])),
    block(BLOCKS.FUNCS, indent([body])),
    `${BLOCKS.EVIDENCE}⟨δ≜0.70;τ≜◊⁺⟩`,
  ].join('\n\n');
}

export function renderFull({ domain, date, body, types, rules, errors }: FullDocumentInput): string {
  return [
    `𝔸${NOTATION_VERSION}.${domain}@${date}\nγ≔${domain}.definitions\nρ≔⟨${domain},types,rules⟩`,
    block(BLOCKS.META, indent([`domain≜${domain}`, 'version≜1.0.0', '∀D∈Doc:Ambig(D)<0.02'])),
    block(BLOCKS.TYPES, indent(types)),
    block(BLOCKS.RULES, indent(rules)),
    block(BLOCKS.FUNCS, indent([body])),
    block(BLOCKS.ERRORS, indent(errors)),
    `${BLOCKS.EVIDENCE}⟨δ≜0.82;φ≜100;τ≜◊⁺⁺;⊢valid;∎⟩`,
  ].join('\n\n');
}
