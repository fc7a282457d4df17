import { KeywordMatchingService } from '../services/KeywordMatchingService';
import { SkillVocabularyService } from '../services/SkillVocabularyService';
import { makeJob, makeResume } from './helpers';

describe('KeywordMatchingService', () => {
  let matcher: KeywordMatchingService;

  beforeEach(() => {
    const vocabulary = new SkillVocabularyService(['python', 'docker', 'microservices', 'kafka']);
    matcher = new KeywordMatchingService(vocabulary, { partialCredit: 0.5, requiredMissingPenalty: 0.85 });
  });

  it('should weigh exact, stemmed and missing terms', () => {
    const job = makeJob('backend role', [
      { term: 'python', required: true },
      { term: 'docker', required: true },
      { term: 'kafka', required: false },
      { term: 'microservices', required: false }
    ]);
    const resume = makeResume({ submissionId: 'r1', text: 'Python developer building a microservice with Kafka' });

    const result = matcher.score(resume, job);

    // (2 + 0 + 1 + 0.5) / 6, then the missing-required penalty
    expect(result.score).toBeCloseTo((3.5 / 6) * 0.85, 6);
    expect(result.matched).toEqual(['python', 'kafka']);
    expect(result.partial).toEqual(['microservices']);
    expect(result.missing).toEqual(['docker']);
    expect(result.missingRequired).toEqual(['docker']);
    expect(result.strengths).toEqual([
      'matched 1 required skills: python',
      'matched 1 preferred skills: kafka',
      'related wording for: microservices'
    ]);
    expect(result.concerns).toEqual(['missing 1 required skills: docker']);
  });

  it('should score 1 when every term matches exactly', () => {
    const job = makeJob('role', [
      { term: 'python', required: true },
      { term: 'kafka', required: false }
    ]);
    const resume = makeResume({ submissionId: 'r1', text: 'Kafka and Python' });

    const result = matcher.score(resume, job);

    expect(result.score).toBe(1);
    expect(result.concerns).toEqual([]);
  });

  it('should score 0 when the job has no requirements', () => {
    const result = matcher.score(makeResume({ submissionId: 'r1', text: 'Python' }), makeJob('role', []));

    expect(result.score).toBe(0);
    expect(result.concerns).toEqual(['job description lists no recognizable skill requirements']);
  });

  it('should apply the penalty once however many required terms are missing', () => {
    const job = makeJob('role', [
      { term: 'python', required: true },
      { term: 'docker', required: true },
      { term: 'kafka', required: true }
    ]);

    const result = matcher.score(makeResume({ submissionId: 'r1', text: 'python' }), job);

    expect(result.score).toBeCloseTo((2 / 6) * 0.85, 6);
    expect(result.concerns).toEqual(['missing 2 required skills: docker, kafka']);
  });

  it('should match caller-supplied terms outside the vocabulary', () => {
    const job = makeJob('role', [{ term: 'spring boot', required: true }]);

    const result = matcher.score(makeResume({ submissionId: 'r1', text: 'Java with Spring Boot' }), job);

    expect(result.score).toBe(1);
  });

  it('should shorten long term lists', () => {
    const terms = ['go', 'rust', 'scala', 'elixir', 'haskell', 'ocaml', 'zig'];
    const job = makeJob('role', terms.map(term => ({ term, required: false })));

    const result = matcher.score(makeResume({ submissionId: 'r1', text: 'python' }), job);

    expect(result.score).toBe(0);
    expect(result.concerns).toEqual(['missing 7 preferred skills: go, rust, scala, elixir, haskell (+2 more)']);
  });
});
