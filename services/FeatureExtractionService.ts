import { v4 as uuidv4 } from 'uuid';
import { ContactFields, EngineWarning, ResumeRecord } from '../types';
import { ExtractionDegraded, errorMessage } from '../utils/errors';
import { FingerprintService } from './FingerprintService';
import { SectionDetectionService } from './SectionDetectionService';
import { SkillVocabularyService } from './SkillVocabularyService';
import { TextCleaningService } from './TextCleaningService';

export interface ResumeInput {
  submissionId?: string;
  text: string;
  fileName: string;
  size?: number;
  uploadedAt?: string | Date;
}

export interface ExtractedFeatures {
  contact: ContactFields;
  skills: string[];
  warnings: EngineWarning[];
}

interface PhoneRule {
  name: string;
  pattern: RegExp;
}

// Tried in order; every hit is canonicalized and the longest canonical number wins.
const PHONE_RULES: readonly PhoneRule[] = [
  { name: 'international-plus', pattern: /(?<![\d+])\+\d{1,3}(?:[ .\-]?\(?\d{1,5}\)?){1,5}(?!\d)/g },
  { name: 'international-00', pattern: /(?<!\d)00\d{1,3}(?:[ .\-]?\(?\d{1,5}\)?){1,5}(?!\d)/g },
  { name: 'area-code', pattern: /(?<![\d+])\(?\d{3}\)?[ .\-]?\d{3}[ .\-]?\d{4}(?!\d)/g },
  { name: 'local-5-5', pattern: /(?<![\d+])\d{5}[ .\-]?\d{5}(?!\d)/g }
];

const EMAIL_PATTERN = /[a-z0-9._%+\-]+@[a-z0-9.\-]+\.[a-z]{2,}/i;
const NAME_LABEL_PATTERN = /^ *(?:full +|candidate +)?name *[:\-] *(.+)$/im;
const NAME_WORD_PATTERN = /^[\p{L}][\p{L}'.\-]*$/u;
const NAME_SCAN_LINES = 5;

const MIN_PHONE_DIGITS = 8;
const MAX_PHONE_DIGITS = 15;

export class FeatureExtractionService {
  private readonly vocabulary: SkillVocabularyService;
  private readonly cleaner: TextCleaningService;
  private readonly defaultCountryCode: string;
  private readonly sections = new SectionDetectionService();

  constructor(
    vocabulary: SkillVocabularyService = new SkillVocabularyService(),
    defaultCountryCode: string = '1',
    cleaner: TextCleaningService = new TextCleaningService()
  ) {
    this.vocabulary = vocabulary;
    this.defaultCountryCode = defaultCountryCode;
    this.cleaner = cleaner;
  }

  /**
   * Never throws. A step that fails leaves its field empty and adds an
   * ExtractionDegraded warning.
   */
  extractFeatures(rawText: string): ExtractedFeatures {
    const warnings: EngineWarning[] = [];
    const cleaned = this.attempt('clean', warnings, () => this.cleaner.cleanText(rawText), rawText);
    const normalized = this.attempt('normalize', warnings, () => this.cleaner.normalizeText(rawText), cleaned.toLowerCase());

    const skills = this.attempt('skills', warnings, () => this.extractSkills(normalized), []);
    const email = this.attempt('email', warnings, () => this.extractEmail(cleaned), null);
    const phone = this.attempt('phone', warnings, () => this.extractPhone(cleaned), null);
    const name = this.attempt('name', warnings, () => this.extractName(cleaned), '');

    const missing: string[] = [];
    if (!name) missing.push('name');
    if (!email) missing.push('email');
    if (!phone) missing.push('phone');
    if (missing.length > 0) {
      warnings.push(degradedWarning(`Contact fields not found: ${missing.join(', ')}`));
    }

    return { contact: { name, email, phone }, skills, warnings };
  }

  buildResumeRecord(input: ResumeInput): ResumeRecord {
    const rawText = typeof input.text === 'string' ? input.text : '';
    const normalizedText = this.cleaner.normalizeText(rawText);
    const features = this.extractFeatures(rawText);
    if (!normalizedText) {
      features.warnings.unshift(degradedWarning('Resume text is empty after normalization'));
    }

    return {
      submissionId: input.submissionId ?? uuidv4(),
      fingerprint: FingerprintService.fingerprint(normalizedText),
      rawText,
      normalizedText,
      contact: features.contact,
      skills: features.skills,
      file: {
        name: input.fileName,
        size: input.size ?? Buffer.byteLength(rawText, 'utf8'),
        uploadedAt: toIsoTimestamp(input.uploadedAt)
      },
      warnings: features.warnings
    };
  }

  extractSkills(normalizedText: string): string[] {
    const view = this.vocabulary.view(normalizedText);
    return [...this.vocabulary.findTerms(view).keys()].sort();
  }

  extractEmail(text: string): string | null {
    const match = text.match(EMAIL_PATTERN);
    return match ? match[0].toLowerCase().replace(/\.+$/, '') : null;
  }

  extractPhone(text: string): string | null {
    let best: { phone: string; position: number } | null = null;

    for (const rule of PHONE_RULES) {
      rule.pattern.lastIndex = 0;
      for (const match of text.matchAll(rule.pattern)) {
        const phone = this.canonicalizeLongest(match[0]);
        if (!phone) continue;
        const position = match.index ?? 0;
        if (
          !best ||
          phone.length > best.phone.length ||
          (phone.length === best.phone.length && position < best.position)
        ) {
          best = { phone, position };
        }
      }
    }

    return best ? best.phone : null;
  }

  /**
   * Canonical form "+<country><number>". Numbers written without a country code
   * take the default one when they have ten digits; anything else without a
   * country code is rejected.
   */
  canonicalizePhone(candidate: string): string | null {
    const trimmed = candidate.trim();
    let digits = trimmed.replace(/\D/g, '');
    let international = trimmed.startsWith('+');

    if (!international && digits.startsWith('00')) {
      digits = digits.slice(2);
      international = true;
    }

    if (!international) {
      if (digits.length === 10) {
        digits = this.defaultCountryCode + digits;
      } else if (!(digits.length === 10 + this.defaultCountryCode.length && digits.startsWith(this.defaultCountryCode))) {
        return null;
      }
    }

    if (digits.length < MIN_PHONE_DIGITS || digits.length > MAX_PHONE_DIGITS) return null;
    return `+${digits}`;
  }

  extractName(cleanedText: string): string {
    const labeled = cleanedText.match(NAME_LABEL_PATTERN);
    if (labeled) {
      const value = collapse(labeled[1]);
      if (value) return value;
    }

    const lines = cleanedText
      .split('\n')
      .map(collapse)
      .filter(line => line.length > 0)
      .slice(0, NAME_SCAN_LINES);

    for (const line of lines) {
      if (this.sections.headingFor(line)) continue;
      if (isPlausibleName(line)) return line;
    }
    return '';
  }

  // A greedy match can swallow a trailing number (a year, a zip code); drop
  // trailing groups until the candidate canonicalizes.
  private canonicalizeLongest(candidate: string): string | null {
    let current = candidate.trim();
    while (current) {
      const phone = this.canonicalizePhone(current);
      if (phone) return phone;
      const cut = current.search(/[ .\-(][^ .\-(]*$/);
      if (cut <= 0) return null;
      current = current.slice(0, cut).trim();
    }
    return null;
  }

  private attempt<T>(step: string, warnings: EngineWarning[], fn: () => T, fallback: T): T {
    try {
      return fn();
    } catch (error) {
      const warning = new ExtractionDegraded(`${step} extraction failed: ${errorMessage(error)}`);
      console.warn(`[FeatureExtractionService] ${warning.message}`);
      warnings.push(degradedWarning(warning.message));
      return fallback;
    }
  }
}

function degradedWarning(message: string): EngineWarning {
  return { code: 'ExtractionDegraded', message };
}

function collapse(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function isPlausibleName(line: string): boolean {
  if (line.length > 60) return false;
  if (/@|https?:|www\.|\d/i.test(line)) return false;
  const words = line.split(' ');
  if (words.length < 2 || words.length > 4) return false;
  return words.every(word => NAME_WORD_PATTERN.test(word));
}

function toIsoTimestamp(value: string | Date | undefined): string {
  if (value === undefined) return new Date().toISOString();
  const date = value instanceof Date ? value : new Date(value);
  return Number.isNaN(date.getTime()) ? new Date().toISOString() : date.toISOString();
}
