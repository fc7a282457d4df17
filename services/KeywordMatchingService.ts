import { JobDescriptionRecord, ResumeRecord } from '../types';
import { clamp01 } from '../utils/scoreNormalization';
import { SkillVocabularyService, TermMatchKind } from './SkillVocabularyService';

export interface TermOutcome {
  term: string;
  required: boolean;
  match: TermMatchKind | 'missing';
}

export interface LexicalScore {
  score: number;
  matched: string[];
  partial: string[];
  missing: string[];
  missingRequired: string[];
  terms: TermOutcome[];
  strengths: string[];
  concerns: string[];
}

export interface KeywordMatchingOptions {
  partialCredit: number;
  requiredMissingPenalty: number;
}

const REQUIRED_WEIGHT = 2;
const PREFERRED_WEIGHT = 1;
const LIST_LIMIT = 5;

export class KeywordMatchingService {
  private readonly vocabulary: SkillVocabularyService;
  private readonly options: KeywordMatchingOptions;

  constructor(
    vocabulary: SkillVocabularyService,
    options: KeywordMatchingOptions = { partialCredit: 0.5, requiredMissingPenalty: 0.85 }
  ) {
    this.vocabulary = vocabulary;
    this.options = options;
  }

  /**
   * Weighted share of the job's requirement terms present in the resume.
   * Exact matches earn full credit, stemmed matches partial credit. Any missing
   * required term applies the penalty multiplier once.
   */
  score(resume: ResumeRecord, job: JobDescriptionRecord): LexicalScore {
    const view = this.vocabulary.view(resume.normalizedText);
    const terms: TermOutcome[] = job.requirements.map(requirement => ({
      term: requirement.term,
      required: requirement.required,
      match: this.vocabulary.matchTerm(requirement.term, view) ?? 'missing'
    }));

    let earned = 0;
    let possible = 0;
    for (const outcome of terms) {
      const weight = outcome.required ? REQUIRED_WEIGHT : PREFERRED_WEIGHT;
      possible += weight;
      if (outcome.match === 'exact') earned += weight;
      else if (outcome.match === 'stemmed') earned += weight * this.options.partialCredit;
    }

    const matched = terms.filter(t => t.match === 'exact').map(t => t.term);
    const partial = terms.filter(t => t.match === 'stemmed').map(t => t.term);
    const missing = terms.filter(t => t.match === 'missing').map(t => t.term);
    const missingRequired = terms.filter(t => t.match === 'missing' && t.required).map(t => t.term);

    let score = possible > 0 ? earned / possible : 0;
    if (missingRequired.length > 0) {
      score *= this.options.requiredMissingPenalty;
    }

    return {
      score: clamp01(score),
      matched,
      partial,
      missing,
      missingRequired,
      terms,
      strengths: this.describeStrengths(terms),
      concerns: this.describeConcerns(terms, possible === 0)
    };
  }

  private describeStrengths(terms: TermOutcome[]): string[] {
    const strengths: string[] = [];
    const requiredHits = terms.filter(t => t.required && t.match === 'exact').map(t => t.term);
    const preferredHits = terms.filter(t => !t.required && t.match === 'exact').map(t => t.term);
    const related = terms.filter(t => t.match === 'stemmed').map(t => t.term);

    if (requiredHits.length > 0) {
      strengths.push(`matched ${requiredHits.length} required skills: ${preview(requiredHits)}`);
    }
    if (preferredHits.length > 0) {
      strengths.push(`matched ${preferredHits.length} preferred skills: ${preview(preferredHits)}`);
    }
    if (related.length > 0) {
      strengths.push(`related wording for: ${preview(related)}`);
    }
    return strengths;
  }

  private describeConcerns(terms: TermOutcome[], noRequirements: boolean): string[] {
    if (noRequirements) {
      return ['job description lists no recognizable skill requirements'];
    }
    const concerns: string[] = [];
    const missingRequired = terms.filter(t => t.required && t.match === 'missing').map(t => t.term);
    const missingPreferred = terms.filter(t => !t.required && t.match === 'missing').map(t => t.term);

    if (missingRequired.length > 0) {
      concerns.push(`missing ${missingRequired.length} required skills: ${preview(missingRequired)}`);
    }
    if (missingPreferred.length > 0) {
      concerns.push(`missing ${missingPreferred.length} preferred skills: ${preview(missingPreferred)}`);
    }
    return concerns;
  }
}

function preview(items: string[]): string {
  const shown = items.slice(0, LIST_LIMIT).join(', ');
  return items.length > LIST_LIMIT ? `${shown} (+${items.length - LIST_LIMIT} more)` : shown;
}
