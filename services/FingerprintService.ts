import { createHash } from 'crypto';

/**
 * Content addressing for resumes and job descriptions.
 * Identity depends only on normalized text, never on filename or upload session.
 */
export class FingerprintService {
  static fingerprint(normalizedText: string): string {
    return createHash('sha256').update(normalizedText, 'utf8').digest('hex');
  }

  static resultKey(jobId: string, fingerprint: string): string {
    return `${jobId}:${fingerprint}`;
  }
}
