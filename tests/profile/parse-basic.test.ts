import { describe, it, expect } from 'vitest';
import {
  extractEmail,
  extractGitHub,
  extractLinkedIn,
  extractName,
  extractPersonalInfo,
  extractPhone,
} from '../../agents/src/profile/resume-parser/parse-basic.js';
import { SAMPLE_RESUME_TEXT } from '../fixtures/resume.js';

describe('resume-parser: parse-basic', () => {
  describe('extractName', () => {
    it('takes the first plain line of the header', () => {
      expect(extractName(SAMPLE_RESUME_TEXT)).toBe('Jane Doe');
    });

    it('skips lines with digits or a phone label', () => {
      const text = 'Phone: call me\n123 Main St\nJane Q Public\n';
      expect(extractName(text)).toBe('Jane Q Public');
    });

    it('skips lines with more than four words', () => {
      expect(extractName('Senior Software Engineer At Big Co\nJane Doe')).toBe('Jane Doe');
    });

    it('only looks at the first five non-empty lines', () => {
      const text = 'Resume 2024\na@b.co\n12\n\n34\n56\nJane Doe';
      expect(extractName(text)).toBeUndefined();
    });

    it('ignores blank lines when counting the first five', () => {
      const text = '\n\n\n\n\n\nJane Doe';
      expect(extractName(text)).toBe('Jane Doe');
    });
  });

  describe('extractEmail', () => {
    it('extracts the first email when multiple present', () => {
      expect(extractEmail('Contact: first@test.com or second@test.com')).toBe('first@test.com');
    });

    it('returns undefined without an email', () => {
      expect(extractEmail('No email here @ all')).toBeUndefined();
    });
  });

  describe('extractPhone', () => {
    it('prefers the dashed format even when a bare number comes first', () => {
      expect(extractPhone('Call 5551234567 or 555-987-6543')).toBe('555-987-6543');
    });

    it('extracts a parenthesized area code', () => {
      expect(extractPhone('Tel (555) 123-4567')).toBe('(555) 123-4567');
    });

    it('extracts ten consecutive digits', () => {
      expect(extractPhone('Mobile: 5551234567')).toBe('5551234567');
    });

    it('returns undefined without a phone number', () => {
      expect(extractPhone('No phone here')).toBeUndefined();
    });
  });

  describe('profile links', () => {
    it('matches LinkedIn case-insensitively and keeps the matched text', () => {
      expect(extractLinkedIn('See LinkedIn.com/in/Jane_Doe-1 for more')).toBe(
        'LinkedIn.com/in/Jane_Doe-1',
      );
    });

    it('matches GitHub handles', () => {
      expect(extractGitHub('code: https://github.com/jane-doe/repo')).toBe('github.com/jane-doe');
    });
  });

  describe('extractPersonalInfo', () => {
    it('collects every field from the sample resume', () => {
      expect(extractPersonalInfo(SAMPLE_RESUME_TEXT)).toEqual({
        name: 'Jane Doe',
        email: 'jane.doe@example.com',
        phone: '555-123-4567',
        linkedin: 'linkedin.com/in/jane-doe',
        github: 'github.com/janedoe',
      });
    });

    it('omits keys that were not found', () => {
      const info = extractPersonalInfo('Jane Doe\nno contact here');
      expect(info).toEqual({ name: 'Jane Doe' });
      expect(info).not.toHaveProperty('email');
      expect(info).not.toHaveProperty('phone');
    });
  });
});
