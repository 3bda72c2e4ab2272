// =============================================================================
// PATHGUARD — Test Suite 02: Tag Vocabulary
//
// The registry loads once and refuses anything ambiguous.
// =============================================================================

import path from 'path';
import {
  buildVocabulary,
  isProjectRoot,
  loadVocabulary,
  lookupDepartment,
  lookupHierarchyToken,
  lookupRoleFolder,
  normalizeTag,
} from '../src/vocabulary';
import { ConfigurationError } from '../src/types/errors';
import { RawVocabulary } from '../src/types/vocabulary';
import { vocabulary } from './helpers';

function rawVocabulary(overrides: Partial<RawVocabulary> = {}): RawVocabulary {
  return {
    departments: ['HR', 'IT'],
    hierarchy: [
      { rank: 0, tokens: ['STAFF'] },
      { rank: 1, tokens: ['MANAGER'] },
      { rank: 2, tokens: ['EXECUTIVE'] },
    ],
    roles: [{ folder: 'lead_docs', role: 'LEAD', rankSubstitute: 2 }],
    projectRoots: ['Projects'],
    defaultDepartment: 'GENERAL',
    defaultRole: 'MEMBER',
    defaultHierarchyLevel: 0,
    adminRank: 2,
    ...overrides,
  };
}

describe('Tag Vocabulary', () => {
  describe('Shipped configuration', () => {
    test('loads departments, ranks and role folders', () => {
      expect([...vocabulary.departments].sort()).toEqual([
        'FINANCE', 'HR', 'IT', 'LEGAL', 'MARKETING', 'OPERATIONS', 'SALES',
      ]);
      expect(vocabulary.maxRank).toBe(3);
      expect(vocabulary.adminRank).toBe(3);
      expect(vocabulary.hierarchyTokens.get('SENIORMANAGER')).toBe(1);
      expect(vocabulary.hierarchyTokens.get('CLEVEL')).toBe(3);
      expect(vocabulary.roleFolders.get('LEADDOCS')).toEqual({ role: 'LEAD', rankSubstitute: 2 });
      expect(vocabulary.roleFolders.get('ADMINFILES')).toEqual({ role: 'ADMIN', rankSubstitute: null });
    });

    test('the registry is frozen', () => {
      expect(Object.isFrozen(vocabulary)).toBe(true);
    });
  });

  describe('Normalization & lookups', () => {
    test('normalizeTag strips punctuation and upper-cases', () => {
      expect(normalizeTag('c-level')).toBe('CLEVEL');
      expect(normalizeTag('Lead Docs')).toBe('LEADDOCS');
      expect(normalizeTag('---')).toBe('');
    });

    test('lookups are case- and separator-insensitive', () => {
      expect(lookupDepartment(vocabulary, 'hr')).toBe('HR');
      expect(lookupDepartment(vocabulary, 'Engineering')).toBeNull();
      expect(lookupHierarchyToken(vocabulary, 'Senior Manager')).toBe(1);
      expect(lookupHierarchyToken(vocabulary, 'Intern')).toBeNull();
      expect(lookupRoleFolder(vocabulary, 'Team-Lead-Private')).toEqual({
        role: 'TEAMLEAD',
        rankSubstitute: null,
      });
      expect(isProjectRoot(vocabulary, 'projects')).toBe(true);
    });
  });

  describe('Configuration errors', () => {
    test('accepts a well-formed vocabulary', () => {
      const built = buildVocabulary(rawVocabulary());
      expect(built.maxRank).toBe(2);
      expect(built.defaultDepartment).toBe('GENERAL');
    });

    test('a token claimed by two dimensions is fatal', () => {
      const build = () =>
        buildVocabulary(
          rawVocabulary({
            hierarchy: [
              { rank: 0, tokens: ['STAFF', 'hr'] },
              { rank: 2, tokens: ['EXECUTIVE'] },
            ],
          })
        );
      expect(build).toThrow(ConfigurationError);
      expect(build).toThrow('Token "hr" is both a department and a hierarchy');
    });

    test('a hierarchy token mapped to two ranks is fatal', () => {
      expect(() =>
        buildVocabulary(
          rawVocabulary({
            hierarchy: [
              { rank: 0, tokens: ['STAFF', 'LEAD'] },
              { rank: 2, tokens: ['lead'] },
            ],
            roles: [],
          })
        )
      ).toThrow('Hierarchy token "lead" is mapped to ranks 0 and 2');
    });

    test('a role folder defined twice with different roles is fatal', () => {
      expect(() =>
        buildVocabulary(
          rawVocabulary({
            roles: [
              { folder: 'lead_docs', role: 'LEAD', rankSubstitute: 2 },
              { folder: 'Lead Docs', role: 'OWNER', rankSubstitute: 2 },
            ],
          })
        )
      ).toThrow('Role folder "Lead Docs" is defined twice with different roles');
    });

    test('rankSubstitute above the highest rank is fatal', () => {
      expect(() =>
        buildVocabulary(
          rawVocabulary({ roles: [{ folder: 'x_docs', role: 'X', rankSubstitute: 5 }] })
        )
      ).toThrow('Role "X" has rankSubstitute 5 above the highest rank (2)');
    });

    test('adminRank must be the highest rank', () => {
      expect(() => buildVocabulary(rawVocabulary({ adminRank: 1 }))).toThrow(
        'adminRank 1 must equal the highest hierarchy rank (2)'
      );
    });

    test('tags without letters or digits are rejected', () => {
      expect(() => buildVocabulary(rawVocabulary({ departments: ['HR', '***'] }))).toThrow(
        'departments contains "***", which has no letters or digits'
      );
    });

    test('wrong shapes are rejected', () => {
      expect(() => buildVocabulary([])).toThrow('Vocabulary must be a JSON object');
      expect(() => buildVocabulary({ ...rawVocabulary(), departments: 'HR' })).toThrow(
        'departments must be an array'
      );
      expect(() =>
        buildVocabulary({ ...rawVocabulary(), hierarchy: [{ rank: -1, tokens: [] }] })
      ).toThrow('hierarchy[0].rank must be a non-negative integer');
    });

    test('a missing vocabulary file is a ConfigurationError', () => {
      const missing = path.join(__dirname, 'does-not-exist.json');
      expect(() => loadVocabulary(missing)).toThrow(ConfigurationError);
      expect(() => loadVocabulary(missing)).toThrow(`Cannot read vocabulary file ${missing}`);
    });
  });
});
