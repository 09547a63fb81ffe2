import { describe, it, expect } from 'vitest';
import { matchesPattern, matchesRule } from '../../src/categorizer/match.js';
import type { ModuleRule } from '../../src/types/index.js';

describe('matchesPattern', () => {
    it('matches anywhere in the key', () => {
        expect(matchesPattern('send_email_reminder', 'email_')).toBe(true);
        expect(matchesPattern('email_subject', 'email_')).toBe(true);
        expect(matchesPattern('subject_email_', 'email_')).toBe(true);
    });

    it('is case-sensitive', () => {
        expect(matchesPattern('Email_subject', 'email_')).toBe(false);
    });

    it('does not normalize separators', () => {
        expect(matchesPattern('sign.in', 'sign_in')).toBe(false);
    });

    it('never matches an empty pattern', () => {
        expect(matchesPattern('anything', '')).toBe(false);
    });

    it('handles an empty key', () => {
        expect(matchesPattern('', 'save')).toBe(false);
    });
});

describe('matchesRule', () => {
    const rule: ModuleRule = { module: 'auth', patterns: ['sign_in', 'password', 'sign_'] };

    it('returns the first matching pattern in rule order', () => {
        expect(matchesRule('sign_in_button', rule)).toBe('sign_in');
        expect(matchesRule('sign_up_button', rule)).toBe('sign_');
    });

    it('returns null when no pattern matches', () => {
        expect(matchesRule('title', rule)).toBeNull();
    });
});
