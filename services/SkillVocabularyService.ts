import * as fs from 'fs';
import { PorterStemmer } from 'natural';
import defaultVocabulary from '../data/skills.json';
import { TextCleaningService } from './TextCleaningService';

export type TermMatchKind = 'exact' | 'stemmed';

interface VocabularyTerm {
  term: string;
  tokens: string[];
  stems: string[];
}

/**
 * Tokenized view of a text, computed once and shared by every term lookup.
 */
export interface TokenView {
  tokens: string[];
  stems: string[];
  tokenSet: Set<string>;
  stemSet: Set<string>;
}

export class SkillVocabularyService {
  private readonly terms: VocabularyTerm[];
  private readonly cleaner: TextCleaningService;

  constructor(terms: string[] = defaultVocabulary.skills, cleaner: TextCleaningService = new TextCleaningService()) {
    this.cleaner = cleaner;
    const seen = new Set<string>();
    this.terms = [];
    for (const raw of terms) {
      const term = raw.trim().toLowerCase();
      if (!term || seen.has(term)) continue;
      seen.add(term);
      const tokens = this.cleaner.tokenize(term);
      if (tokens.length === 0) continue;
      this.terms.push({ term, tokens, stems: tokens.map(stem) });
    }
  }

  static fromFile(filePath: string, cleaner?: TextCleaningService): SkillVocabularyService {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    const list = Array.isArray(parsed)
      ? parsed
      : typeof parsed === 'object' && parsed !== null && 'skills' in parsed
        ? parsed.skills
        : null;
    if (!Array.isArray(list) || !list.every((item): item is string => typeof item === 'string')) {
      throw new Error(`Skill vocabulary at ${filePath} must be a string array or { "skills": string[] }`);
    }
    return new SkillVocabularyService(list, cleaner);
  }

  get size(): number {
    return this.terms.length;
  }

  has(term: string): boolean {
    const normalized = term.trim().toLowerCase();
    return this.terms.some(t => t.term === normalized);
  }

  view(normalizedText: string): TokenView {
    const tokens = this.cleaner.tokenize(normalizedText);
    const stems = tokens.map(stem);
    return { tokens, stems, tokenSet: new Set(tokens), stemSet: new Set(stems) };
  }

  /**
   * Every vocabulary term present in the text, with how it matched.
   * Terms outside the vocabulary are never reported.
   */
  findTerms(view: TokenView): Map<string, TermMatchKind> {
    const found = new Map<string, TermMatchKind>();
    for (const entry of this.terms) {
      const kind = this.matchEntry(entry, view);
      if (kind) found.set(entry.term, kind);
    }
    return found;
  }

  /**
   * Match an arbitrary term (vocabulary or caller-supplied requirement) against a text view.
   */
  matchTerm(term: string, view: TokenView): TermMatchKind | null {
    const tokens = this.cleaner.tokenize(term.toLowerCase());
    if (tokens.length === 0) return null;
    return this.matchEntry({ term, tokens, stems: tokens.map(stem) }, view);
  }

  private matchEntry(entry: VocabularyTerm, view: TokenView): TermMatchKind | null {
    if (entry.tokens.length === 1) {
      if (view.tokenSet.has(entry.tokens[0])) return 'exact';
      if (view.stemSet.has(entry.stems[0])) return 'stemmed';
      return null;
    }
    if (containsSequence(view.tokens, entry.tokens)) return 'exact';
    if (containsSequence(view.stems, entry.stems)) return 'stemmed';
    return null;
  }
}

function stem(token: string): string {
  return PorterStemmer.stem(token);
}

function containsSequence(haystack: string[], needle: string[]): boolean {
  if (needle.length === 0 || needle.length > haystack.length) return false;
  outer: for (let i = 0; i <= haystack.length - needle.length; i++) {
    for (let j = 0; j < needle.length; j++) {
      if (haystack[i + j] !== needle[j]) continue outer;
    }
    return true;
  }
  return false;
}
