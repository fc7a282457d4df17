const MAX_HEADING_WORDS = 6;

export class SectionDetectionService {
  // Order matters: "Preferred Qualifications" must be claimed before "Qualifications".
  private readonly sectionPatterns: Array<{ name: string; pattern: RegExp }> = [
    { name: 'preferred', pattern: /^(Preferred( Skills| Qualifications| Requirements)?|Nice[ -]to[ -]have|Bonus( Points| Skills)?|Good to have|Desirable)\b/i },
    { name: 'requirements', pattern: /^(Requirements|Required( Skills| Qualifications)?|Qualifications|Must[ -]have|Minimum Qualifications)\b/i },
    { name: 'responsibilities', pattern: /^(Responsibilities|Key Responsibilities|Job Responsibilities|What You.ll Do)\b/i },
    { name: 'experience', pattern: /^(Experience|Work History|Work Experience|Professional Experience|Employment History)\b/i },
    { name: 'education', pattern: /^(Education|Academic Background|Educational Background)\b/i },
    { name: 'skills', pattern: /^(Skills|Technical Skills|Core Competencies|Competencies|Tech Stack)\b/i },
    { name: 'summary', pattern: /^(Summary|Professional Summary|Profile|Objective|About the Role)\b/i },
    { name: 'projects', pattern: /^(Projects|Project Experience)\b/i },
    { name: 'certifications', pattern: /^(Certifications|Certificates)\b/i },
    { name: 'languages', pattern: /^(Languages|Language Skills)\b/i },
    { name: 'awards', pattern: /^(Awards|Honors|Achievements)\b/i }
  ];

  /**
   * A heading is a short line, optionally ending in ':', that starts with a known
   * section label. "Experience with Kafka is required" is body text, not a heading.
   */
  headingFor(line: string): string | null {
    if (!line || /^[*•\-]/.test(line)) return null;
    const label = line.replace(/^#+\s*/, '').replace(/:\s*$/, '').trim();
    const endsWithColon = /:\s*$/.test(line);
    if (label.split(/\s+/).length > MAX_HEADING_WORDS) return null;

    for (const entry of this.sectionPatterns) {
      const match = entry.pattern.exec(label);
      if (!match) continue;
      const remainder = label.slice(match[0].length).trim();
      if (endsWithColon || remainder === '' || /^(and|&)\s/i.test(remainder)) {
        return entry.name;
      }
    }
    return null;
  }
}
