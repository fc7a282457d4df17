import {
  ClusterMember,
  CriterionName,
  DuplicateCluster,
  PairSimilarity,
  ResumeRecord,
  SurvivorCriterion
} from '../types';
import { DisjointSet } from '../utils/DisjointSet';
import { compareCodeUnits, compareNumbers } from '../utils/compare';
import { DuplicateThresholdInvalid } from '../utils/errors';
import { clamp01, jaccard, toPercent } from '../utils/scoreNormalization';
import { TextCleaningService } from './TextCleaningService';

export interface DuplicateCandidate {
  resume: ResumeRecord;
  /** Composite in [0,1], or null when scoring failed. */
  composite: number | null;
}

export interface DuplicateDetectionOptions {
  threshold: number;
  strongSignal: number;
  textWeight: number;
  skillWeight: number;
  shingleSize: number;
  survivorOrder: SurvivorCriterion[];
}

export interface DuplicateAssignment {
  submissionId: string;
  clusterId: string;
  suppressed: boolean;
  duplicateOf: string | null;
}

export interface DetectionResult {
  clusters: DuplicateCluster[];
  /** One per candidate, in input order. */
  assignments: DuplicateAssignment[];
}

interface PreparedCandidate {
  candidate: DuplicateCandidate;
  shingles: Set<string>;
  skills: Set<string>;
}

const DEFAULT_OPTIONS: DuplicateDetectionOptions = {
  threshold: 0.85,
  strongSignal: 0.95,
  textWeight: 0.7,
  skillWeight: 0.3,
  shingleSize: 3,
  survivorOrder: ['score', 'contact', 'upload']
};

const SCORE_EPSILON = 1e-9;

export class DuplicateDetectionService {
  private readonly options: DuplicateDetectionOptions;
  private readonly cleaner: TextCleaningService;

  constructor(options: Partial<DuplicateDetectionOptions> = {}, cleaner: TextCleaningService = new TextCleaningService()) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    const threshold = this.options.threshold;
    if (typeof threshold !== 'number' || !Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new DuplicateThresholdInvalid(threshold);
    }
    this.cleaner = cleaner;
  }

  get threshold(): number {
    return this.options.threshold;
  }

  /**
   * Pairwise similarity over the four criteria. Score proximity is recorded
   * for tie-breaking only and never feeds the overall similarity.
   */
  compare(a: DuplicateCandidate, b: DuplicateCandidate): PairSimilarity {
    return this.comparePrepared(this.prepare(a), this.prepare(b));
  }

  /**
   * Partitions indices 0..count-1: any pair at or above the threshold joins
   * the same group, transitively.
   */
  formClusters(count: number, similarity: (i: number, j: number) => number): number[][] {
    const sets = new DisjointSet(count);
    for (let i = 0; i < count; i++) {
      for (let j = i + 1; j < count; j++) {
        if (similarity(i, j) >= this.options.threshold) {
          sets.union(i, j);
        }
      }
    }
    return sets.groups();
  }

  detect(jobId: string, candidates: DuplicateCandidate[]): DetectionResult {
    const prepared = candidates.map(candidate => this.prepare(candidate));
    const pairs = new Map<string, PairSimilarity>();
    for (let i = 0; i < prepared.length; i++) {
      for (let j = i + 1; j < prepared.length; j++) {
        pairs.set(pairKey(i, j), this.comparePrepared(prepared[i], prepared[j]));
      }
    }

    const groups = this.formClusters(candidates.length, (i, j) => pairs.get(pairKey(i, j))?.overall ?? 0);

    const clusters: DuplicateCluster[] = [];
    const assignments = new Array<DuplicateAssignment>(candidates.length);

    for (const group of groups) {
      const ranked = [...group].sort((x, y) => this.compareSurvivors(candidates[x], candidates[y]));
      const survivorIndex = ranked[0];
      const survivor = member(candidates[survivorIndex]);
      const clusterId = `${jobId.slice(0, 12)}:${survivor.submissionId}`;

      const clusterPairs: PairSimilarity[] = [];
      for (let a = 0; a < group.length; a++) {
        for (let b = a + 1; b < group.length; b++) {
          const pair = pairs.get(pairKey(group[a], group[b]));
          if (pair) clusterPairs.push(pair);
        }
      }

      clusters.push({
        clusterId,
        jobId,
        members: group.map(index => member(candidates[index])),
        survivor,
        pairs: clusterPairs,
        survivorRationale:
          ranked.length > 1
            ? this.explainSurvivor(candidates[survivorIndex], candidates[ranked[1]])
            : 'Single submission'
      });

      for (const index of group) {
        const isSurvivor = index === survivorIndex;
        assignments[index] = {
          submissionId: candidates[index].resume.submissionId,
          clusterId,
          suppressed: !isSurvivor,
          duplicateOf: isSurvivor ? null : survivor.submissionId
        };
      }
    }

    const duplicateGroups = clusters.filter(cluster => cluster.members.length > 1).length;
    if (duplicateGroups > 0) {
      console.log(`[DuplicateDetectionService] ${duplicateGroups} duplicate cluster(s) across ${candidates.length} submissions`);
    }

    return { clusters, assignments };
  }

  /**
   * Negative when `a` should survive over `b`. Applies the configured criteria
   * in order, then submission id so the outcome never depends on input order.
   */
  compareSurvivors(a: DuplicateCandidate, b: DuplicateCandidate): number {
    for (const criterion of this.options.survivorOrder) {
      const result = this.compareBy(criterion, a, b);
      if (result !== 0) return result;
    }
    return compareCodeUnits(a.resume.submissionId, b.resume.submissionId);
  }

  private compareBy(criterion: SurvivorCriterion, a: DuplicateCandidate, b: DuplicateCandidate): number {
    switch (criterion) {
      case 'score': {
        const diff = (b.composite ?? -1) - (a.composite ?? -1);
        return Math.abs(diff) <= SCORE_EPSILON ? 0 : compareNumbers(diff, 0);
      }
      case 'contact': {
        const completeness = contactCompleteness(b.resume) - contactCompleteness(a.resume);
        if (completeness !== 0) return compareNumbers(completeness, 0);
        return compareNumbers(b.resume.skills.length, a.resume.skills.length);
      }
      case 'upload': {
        const diff = Date.parse(a.resume.file.uploadedAt) - Date.parse(b.resume.file.uploadedAt);
        return Number.isNaN(diff) ? 0 : compareNumbers(diff, 0);
      }
    }
  }

  private explainSurvivor(winner: DuplicateCandidate, runnerUp: DuplicateCandidate): string {
    const deciding = this.options.survivorOrder.find(criterion => this.compareBy(criterion, winner, runnerUp) !== 0);
    switch (deciding) {
      case 'score':
        return `Highest composite score (${formatScore(winner.composite)} vs ${formatScore(runnerUp.composite)})`;
      case 'contact': {
        const won = contactCompleteness(winner.resume);
        const lost = contactCompleteness(runnerUp.resume);
        if (won !== lost) {
          return `Most complete contact details (${won} of 3 fields vs ${lost})`;
        }
        return `Most extracted skills (${winner.resume.skills.length} vs ${runnerUp.resume.skills.length})`;
      }
      case 'upload':
        return `Earliest upload (${winner.resume.file.uploadedAt})`;
      default:
        return `Tied on all criteria; lowest submission id (${winner.resume.submissionId})`;
    }
  }

  private prepare(candidate: DuplicateCandidate): PreparedCandidate {
    return {
      candidate,
      shingles: this.shingles(candidate.resume.normalizedText),
      skills: new Set(candidate.resume.skills)
    };
  }

  private shingles(normalizedText: string): Set<string> {
    const tokens = this.cleaner.tokenize(normalizedText);
    const size = this.options.shingleSize;
    const shingles = new Set<string>();
    if (tokens.length === 0) return shingles;
    if (tokens.length < size) {
      shingles.add(tokens.join(' '));
      return shingles;
    }
    for (let i = 0; i <= tokens.length - size; i++) {
      shingles.add(tokens.slice(i, i + size).join(' '));
    }
    return shingles;
  }

  private comparePrepared(left: PreparedCandidate, right: PreparedCandidate): PairSimilarity {
    const a = left.candidate;
    const b = right.candidate;

    const text = jaccard(left.shingles, right.shingles);
    const contact = sameContact(a.resume, b.resume) ? 1 : 0;
    const skills = jaccard(left.skills, right.skills);
    const scoreProximity =
      a.composite !== null && b.composite !== null ? clamp01(1 - Math.abs(a.composite - b.composite)) : 0;

    let overall: number;
    let trigger: CriterionName;
    if (text >= this.options.strongSignal || contact >= this.options.strongSignal) {
      overall = Math.max(text, contact);
      trigger = text >= contact ? 'text' : 'contact';
    } else {
      overall = clamp01(this.options.textWeight * text + this.options.skillWeight * skills);
      trigger = 'blend';
    }

    return {
      a: a.resume.submissionId,
      b: b.resume.submissionId,
      text,
      contact,
      skills,
      scoreProximity,
      nameMatch: sameName(a.resume, b.resume),
      overall,
      trigger,
      duplicate: overall >= this.options.threshold
    };
  }
}

function pairKey(i: number, j: number): string {
  return i < j ? `${i}:${j}` : `${j}:${i}`;
}

function member(candidate: DuplicateCandidate): ClusterMember {
  return { submissionId: candidate.resume.submissionId, fingerprint: candidate.resume.fingerprint };
}

function sameContact(a: ResumeRecord, b: ResumeRecord): boolean {
  const email = a.contact.email !== null && a.contact.email === b.contact.email;
  const phone = a.contact.phone !== null && a.contact.phone === b.contact.phone;
  return email || phone;
}

function sameName(a: ResumeRecord, b: ResumeRecord): boolean {
  const left = a.contact.name.trim().toLowerCase();
  return left.length > 0 && left === b.contact.name.trim().toLowerCase();
}

function contactCompleteness(resume: ResumeRecord): number {
  return [resume.contact.name.trim(), resume.contact.email, resume.contact.phone].filter(Boolean).length;
}

function formatScore(composite: number | null): string {
  return composite === null ? 'unscored' : `${toPercent(composite)}%`;
}
