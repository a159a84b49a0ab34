/**
 * Tests for skill scoring and gap analysis
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { SkillMatcher, missingSkills, skillMatchScore } from '../../tailoring/matching/skillMatcher';

describe('SkillMatcher', () => {
  const matcher = new SkillMatcher();

  describe('score', () => {
    it('should score the share of requirements met out of 10', () => {
      expect(matcher.score(['Python', 'Django', 'JavaScript'], ['Python', 'Django', 'React'])).toBe(7);
    });

    it('should score 0 without requirements', () => {
      expect(matcher.score(['Python'], [])).toBe(0);
      expect(matcher.score(['Python'], ['  ', ''])).toBe(0);
    });

    it('should score 0 without candidate skills', () => {
      expect(matcher.score([], ['Python'])).toBe(0);
    });

    it('should match case-insensitively in either direction', () => {
      expect(matcher.score(['react native'], ['React'])).toBe(10);
      expect(matcher.score(['SQL'], ['PostgreSQL'])).toBe(10);
    });

    it('should round halves up', () => {
      expect(matcher.score(['a'], ['a', 'b', 'c', 'd'])).toBe(3);
      expect(matcher.score(['a', 'b', 'c'], ['a', 'b', 'c', 'd'])).toBe(8);
      expect(matcher.score(['a'], ['a', 'x'])).toBe(5);
    });

    it('should stay within 0..10', () => {
      const skills = fc.array(fc.string({ maxLength: 8 }), { maxLength: 10 });
      fc.assert(
        fc.property(skills, skills, (candidate, required) => {
          const score = skillMatchScore(candidate, required);
          return Number.isInteger(score) && score >= 0 && score <= 10;
        }),
        { numRuns: 200 }
      );
    });
  });

  describe('missing', () => {
    it('should list unmet requirements in order', () => {
      expect(matcher.missing(['Python', 'Django'], ['Python', 'Django', 'React', 'TypeScript']))
        .toEqual(['React', 'TypeScript']);
    });

    it('should keep requirement casing and drop duplicates', () => {
      expect(missingSkills(['Go'], ['Kubernetes', 'kubernetes', ' Terraform ']))
        .toEqual(['Kubernetes', 'Terraform']);
    });

    it('should be empty when everything is covered', () => {
      expect(matcher.missing(['TypeScript', 'Node.js'], ['typescript'])).toEqual([]);
    });

    it('should never report a requirement the score counted as met', () => {
      const skill = fc.constantFrom('Python', 'Django', 'React', 'AWS', 'SQL', 'Go');
      fc.assert(
        fc.property(fc.array(skill), fc.array(skill, { minLength: 1 }), (candidate, required) => {
          const missing = missingSkills(candidate, required);
          return missing.every(m => !candidate.some(c => c.toLowerCase() === m.toLowerCase()));
        }),
        { numRuns: 200 }
      );
    });
  });
});
