import { JobDescriptionRecord, RequirementTerm, ScoreWeights } from '../types';
import { compareCodeUnits } from '../utils/compare';
import { ConfigurationError } from '../utils/errors';
import { FingerprintService } from './FingerprintService';
import { SectionDetectionService } from './SectionDetectionService';
import { SkillVocabularyService } from './SkillVocabularyService';
import { TextCleaningService } from './TextCleaningService';

export interface JobDescriptionInput {
  text: string;
  title?: string;
  /** Explicit requirement lists replace vocabulary extraction when given. */
  required?: string[];
  preferred?: string[];
  weights?: Partial<ScoreWeights>;
}

type LineContext = 'required' | 'preferred' | 'neutral';

const REQUIRED_MARKER = /\b(required|requirements?|must[ -]have|must|mandatory|essential)\b/i;
const PREFERRED_MARKER = /\b(preferred|nice[ -]to[ -]have|bonus|a plus|desirable|good to have|optional)\b/i;
const MAX_TITLE_LENGTH = 100;

/**
 * Builds the job description record: identity, title and the requirement terms
 * the lexical matcher scores against. Extraction is deterministic; the same
 * text always yields the same terms and the same jobId.
 */
export class JobDescriptionService {
  private readonly vocabulary: SkillVocabularyService;
  private readonly cleaner: TextCleaningService;
  private readonly sections: SectionDetectionService;
  private readonly defaultWeights: ScoreWeights;

  constructor(
    vocabulary: SkillVocabularyService,
    defaultWeights: ScoreWeights,
    cleaner: TextCleaningService = new TextCleaningService(),
    sections: SectionDetectionService = new SectionDetectionService()
  ) {
    this.vocabulary = vocabulary;
    this.defaultWeights = defaultWeights;
    this.cleaner = cleaner;
    this.sections = sections;
  }

  buildJobDescriptionRecord(input: JobDescriptionInput): JobDescriptionRecord {
    const rawText = input.text;
    const cleaned = this.cleaner.cleanText(rawText);
    const normalizedText = this.cleaner.normalizeText(rawText);

    const requirements =
      input.required !== undefined || input.preferred !== undefined
        ? this.explicitRequirements(input.required ?? [], input.preferred ?? [])
        : this.extractRequirements(cleaned);

    if (requirements.length === 0) {
      console.warn('[JobDescriptionService] No requirement terms recognized in job description');
    }

    return {
      jobId: FingerprintService.fingerprint(normalizedText),
      title: this.resolveTitle(input.title, cleaned),
      rawText,
      normalizedText,
      requirements,
      weights: this.resolveWeights(input.weights)
    };
  }

  /**
   * Vocabulary terms found in the text. A term is required when any occurrence
   * sits in a requirements section or on a line marked as required. When the
   * text carries no such structure at all, every term is required.
   */
  extractRequirements(cleanedText: string): RequirementTerm[] {
    const contexts = new Map<string, LineContext[]>();
    let section: string | null = null;
    let structured = false;

    for (const line of cleanedText.split('\n')) {
      const heading = this.sections.headingFor(line.trim());
      if (heading) {
        section = heading;
        if (heading === 'requirements' || heading === 'preferred') structured = true;
        continue;
      }

      const context = this.lineContext(line, section);
      if (context !== 'neutral') structured = true;

      const view = this.vocabulary.view(this.cleaner.normalizeText(line));
      for (const term of this.vocabulary.findTerms(view).keys()) {
        const seen = contexts.get(term);
        if (seen) {
          seen.push(context);
        } else {
          contexts.set(term, [context]);
        }
      }
    }

    return [...contexts.entries()]
      .map(([term, seen]) => ({
        term,
        required: structured ? seen.includes('required') : true
      }))
      .sort(compareRequirements);
  }

  private explicitRequirements(required: string[], preferred: string[]): RequirementTerm[] {
    const byTerm = new Map<string, boolean>();
    for (const raw of preferred) {
      const term = raw.trim().toLowerCase();
      if (term) byTerm.set(term, false);
    }
    for (const raw of required) {
      const term = raw.trim().toLowerCase();
      if (term) byTerm.set(term, true);
    }
    return [...byTerm.entries()].map(([term, isRequired]) => ({ term, required: isRequired })).sort(compareRequirements);
  }

  private lineContext(line: string, section: string | null): LineContext {
    if (PREFERRED_MARKER.test(line)) return 'preferred';
    if (REQUIRED_MARKER.test(line)) return 'required';
    if (section === 'requirements') return 'required';
    if (section === 'preferred') return 'preferred';
    return 'neutral';
  }

  private resolveTitle(title: string | undefined, cleanedText: string): string {
    const explicit = title?.trim();
    if (explicit) return explicit;
    const firstLine = cleanedText
      .split('\n')
      .map(line => line.trim())
      .find(line => line.length > 0);
    if (!firstLine) return 'Untitled role';
    return firstLine.length > MAX_TITLE_LENGTH ? `${firstLine.slice(0, MAX_TITLE_LENGTH - 3)}...` : firstLine;
  }

  private resolveWeights(overrides: Partial<ScoreWeights> | undefined): ScoreWeights {
    const weights: ScoreWeights = {
      lexical: overrides?.lexical ?? this.defaultWeights.lexical,
      semantic: overrides?.semantic ?? this.defaultWeights.semantic,
      ai: overrides?.ai ?? this.defaultWeights.ai
    };
    for (const [name, value] of Object.entries(weights)) {
      if (!Number.isFinite(value) || value < 0) {
        throw new ConfigurationError(`Weight "${name}" must be a non-negative number, got ${value}`);
      }
    }
    if (weights.lexical <= 0) {
      throw new ConfigurationError('Lexical weight must be positive');
    }
    return weights;
  }
}

function compareRequirements(a: RequirementTerm, b: RequirementTerm): number {
  if (a.required !== b.required) return a.required ? -1 : 1;
  return compareCodeUnits(a.term, b.term);
}
