/**
 * Skill Matcher
 *
 * Compares a candidate's declared skills with a posting's requirements.
 * A requirement is met when, case-insensitively, either string contains the
 * other ("React" meets "React Native" and vice versa).
 */

function clean(skills: readonly string[]): string[] {
  return skills.map(s => s.trim()).filter(s => s.length > 0);
}

function matches(candidate: readonly string[], requirement: string): boolean {
  const needle = requirement.toLowerCase();
  return candidate.some(skill => skill.includes(needle) || needle.includes(skill));
}

/**
 * Fraction of requirements met, scaled to 0..10 and rounded half up.
 * No requirements scores 0.
 */
export function skillMatchScore(candidateSkills: readonly string[], requiredSkills: readonly string[]): number {
  const required = clean(requiredSkills);
  if (required.length === 0) {
    return 0;
  }
  const candidate = clean(candidateSkills).map(s => s.toLowerCase());
  const matched = required.filter(r => matches(candidate, r)).length;
  return Math.round((matched / required.length) * 10);
}

/**
 * Requirements with no match, in requirement order and casing; a
 * requirement listed twice (ignoring case) is reported once
 */
export function missingSkills(candidateSkills: readonly string[], requiredSkills: readonly string[]): string[] {
  const candidate = clean(candidateSkills).map(s => s.toLowerCase());
  const seen = new Set<string>();
  const missing: string[] = [];

  for (const requirement of clean(requiredSkills)) {
    const key = requirement.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    if (!matches(candidate, requirement)) {
      missing.push(requirement);
    }
  }
  return missing;
}

export class SkillMatcher {
  score(candidateSkills: readonly string[], requiredSkills: readonly string[]): number {
    return skillMatchScore(candidateSkills, requiredSkills);
  }

  missing(candidateSkills: readonly string[], requiredSkills: readonly string[]): string[] {
    return missingSkills(candidateSkills, requiredSkills);
  }
}
