import { describe, it, expect } from 'vitest';
import {
  deriveProjectName,
  detectRequirements,
  detectTechStack,
  extractBudget,
  firstSentence,
  isGroundedRequirement,
  mentions,
  usesEmbeddedDatabase,
} from '../signals/index.js';

describe('extractBudget', () => {
  it.each([
    ['Budget is ₹50,000 a month', 50000],
    ['We can spend Rs. 20000', 20000],
    ['INR 15000 per month', 15000],
    ['around 30,000 rupees', 30000],
    ['For our users, budget Rs 12,500', 12500],
  ])('reads %j', (text, expected) => {
    expect(extractBudget(text)).toBe(expected);
  });

  it('returns undefined when no INR amount is stated', () => {
    expect(extractBudget('budget is 20k')).toBeUndefined();
    expect(extractBudget('for users, mostly')).toBeUndefined();
  });
});

describe('mentions', () => {
  it('matches whole words only', () => {
    expect(mentions('Built on Go and React', 'react')).toBe(true);
    expect(mentions('A reactive dashboard', 'react')).toBe(false);
    expect(mentions('Runs on Node.js', 'node.js')).toBe(true);
  });
});

describe('firstSentence', () => {
  it('does not split on dots inside names', () => {
    expect(firstSentence('A site on Next.js. It has users.')).toBe('A site on Next.js');
  });

  it('stops at a line break', () => {
    expect(firstSentence('\nFirst line\nsecond line')).toBe('First line');
  });
});

describe('deriveProjectName', () => {
  it('uses an explicit name', () => {
    expect(deriveProjectName('A booking tool named Slotify for salons')).toBe('Slotify');
  });

  it('falls back to meaningful words', () => {
    expect(deriveProjectName('We want to build a recipe sharing platform.')).toBe('Recipe Sharing');
    expect(deriveProjectName('We want to build a new app')).toBe('Untitled Project');
  });
});

describe('detectTechStack', () => {
  it('takes the first technology per category', () => {
    expect(detectTechStack('Django API with Postgres and MongoDB, deployed with Docker on GCP')).toEqual({
      backend: 'Django',
      database: 'PostgreSQL',
      container: 'Docker',
      cloud: 'GCP',
    });
  });
});

describe('detectRequirements', () => {
  it('finds concepts and data volume', () => {
    expect(detectRequirements('HIPAA compliant, stores 5 TB of scans, needs backup')).toEqual([
      'Disaster Recovery',
      'Compliance',
      'Data Volume 5 TB',
    ]);
  });
});

describe('isGroundedRequirement', () => {
  const text = 'Video archive with 100 TB of footage and 99.9% uptime';

  it('keeps requirements whose numbers appear in the text', () => {
    expect(isGroundedRequirement('Store 100 TB', text)).toEqual({ grounded: true, label: 'Store 100 TB' });
  });

  it('keeps concepts with evidence in the text', () => {
    expect(isGroundedRequirement('high availability', text)).toEqual({ grounded: true, label: 'High Availability' });
  });

  it('drops invented requirements', () => {
    expect(isGroundedRequirement('Blockchain ledger', text).grounded).toBe(false);
    expect(isGroundedRequirement('Scalability', text).grounded).toBe(false);
  });
});

describe('usesEmbeddedDatabase', () => {
  it('recognises SQLite only', () => {
    expect(usesEmbeddedDatabase({ database: 'SQLite' })).toBe(true);
    expect(usesEmbeddedDatabase({ database: 'PostgreSQL' })).toBe(false);
    expect(usesEmbeddedDatabase({})).toBe(false);
  });
});
