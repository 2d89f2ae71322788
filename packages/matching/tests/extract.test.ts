import { describe, expect, it } from 'vitest';
import {
  carveRequirementsFromDescription,
  getCompanyName,
  getDescription,
  getJobSkills,
  getJobTitle,
  getRequirements,
  isRequirementKey,
  locateRequirements,
} from '../src/extract.js';

describe('getDescription', () => {
  it('returns a plain string value trimmed', () => {
    expect(getDescription({ JobDescription: '  Pack and ship orders.  ' })).toBe('Pack and ship orders.');
  });

  it('unwraps a caption mapping', () => {
    expect(getDescription({ JobDescription: { caption: 'Drive forklifts' } })).toBe('Drive forklifts');
  });

  it('probes sub-keys in order', () => {
    expect(getDescription({ Description: { text: 'from text', value: 'from value' } })).toBe('from value');
  });

  it('moves to the next candidate key when a mapping has no text', () => {
    expect(getDescription({ JobDescription: { caption: '  ' }, Description: 'Fallback' })).toBe('Fallback');
  });

  it('takes the first key that yields text without merging', () => {
    expect(getDescription({ JobDescription: 'First', Description: 'Second', jobDesc: 'Third' })).toBe('First');
  });

  it('supports the lower-case schema variants', () => {
    expect(getDescription({ job_description: 'snake' })).toBe('snake');
    expect(getDescription({ jobDesc: { description: 'camel' } })).toBe('camel');
  });

  it('returns empty string for values of unexpected type', () => {
    expect(getDescription({ JobDescription: 42, Description: ['a list'] })).toBe('');
  });

  it('returns empty string for non-record input', () => {
    expect(getDescription(null)).toBe('');
    expect(getDescription(['JobDescription'])).toBe('');
    expect(getDescription('JobDescription')).toBe('');
  });
});

describe('getRequirements', () => {
  it('joins list items from a known key, unwrapping mappings', () => {
    const job = {
      id_Job_Requirement: [{ caption: 'Looker' }, 'SQL', { value: ' Excel ' }, { other: 'ignored' }, 5],
    };

    expect(locateRequirements(job)).toEqual({ text: 'Looker\nSQL\nExcel', tier: 'known-keys' });
  });

  it('skips an empty known-key list and tries the next known key', () => {
    expect(getRequirements({ id_Job_Requirement: [], Job_Requirements: 'Degree' })).toBe('Degree');
  });

  it('reads JobRequirement sub-keys of a known-key mapping', () => {
    expect(getRequirements({ id_Job_Requirements: { JobRequirements: 'Shift work' } })).toBe('Shift work');
  });

  it('falls back to legacy keys', () => {
    expect(locateRequirements({ Requirements: { text: 'Team player' } })).toEqual({
      text: 'Team player',
      tier: 'legacy-keys',
    });
  });

  it('finds a nested AboutYou caption through the fuzzy walk', () => {
    const job = {
      Title: 'Warehouse Lead',
      details: { profile: { AboutYou: { caption: 'Must have 3 years in logistics' } } },
    };

    expect(locateRequirements(job)).toEqual({ text: 'Must have 3 years in logistics', tier: 'fuzzy-keys' });
  });

  it('collects every string under a matching key and dedupes in first-seen order', () => {
    const job = {
      minQualifications: 'Degree',
      meta: {
        note: 'not collected',
        candidateRequirements: ['Degree', 'Driving licence'],
      },
    };

    expect(getRequirements(job)).toBe('Degree\nDriving licence');
  });

  it('does not collect strings under keys without a requirement hint', () => {
    expect(getRequirements({ meta: { note: 'Requirements: none' } })).toBe('');
  });

  it('stops descending past the depth limit', () => {
    let deep: Record<string, unknown> = { Qualification: 'too deep' };
    for (let i = 0; i < 40; i++) {
      deep = { child: deep };
    }

    expect(getRequirements(deep)).toBe('');
  });

  it('terminates on self-referencing records', () => {
    const loop: Record<string, unknown> = {};
    loop.self = loop;
    loop.Qualification = 'Degree';

    expect(getRequirements({ loop })).toBe('Degree');
  });

  it('terminates on records with several back-references', () => {
    const loop: Record<string, unknown> = {};
    loop.a = loop;
    loop.b = loop;

    expect(getRequirements({ loop })).toBe('');
  });

  it('collects text once from a cyclic requirement value', () => {
    const section: Record<string, unknown> = { first: 'Forklift licence' };
    section.again = section;
    section.parent = section;
    section.second = ['Night shifts', section];

    expect(getRequirements({ meta: { WhoYouAre: section } })).toBe('Forklift licence\nNight shifts');
  });

  it('carves the section out of the description as a last resort', () => {
    const job = {
      JobDescription: 'What you bring\n- Looker\n- SQL\n\nPerks:\nFree lunch',
    };

    expect(locateRequirements(job)).toEqual({ text: '- Looker\n- SQL', tier: 'description' });
  });

  it('returns empty text and no tier when nothing matches', () => {
    expect(locateRequirements({ Title: 'Cook', JobDescription: 'Great team' })).toEqual({ text: '', tier: null });
    expect(locateRequirements(undefined)).toEqual({ text: '', tier: null });
  });
});

describe('isRequirementKey', () => {
  it('ignores case and separators', () => {
    expect(isRequirementKey('AboutYou')).toBe(true);
    expect(isRequirementKey('about_you')).toBe(true);
    expect(isRequirementKey('What You Bring')).toBe(true);
    expect(isRequirementKey('RequirementDetail')).toBe(true);
    expect(isRequirementKey('Salaryrange')).toBe(false);
  });
});

describe('carveRequirementsFromDescription', () => {
  it('returns empty string when no heading is present', () => {
    expect(carveRequirementsFromDescription('Great team, great pay')).toBe('');
    expect(carveRequirementsFromDescription('')).toBe('');
  });

  it('normalizes CRLF line endings', () => {
    expect(carveRequirementsFromDescription('Intro\r\nQualifications\r\nDegree in IT\r\nApply now')).toBe(
      'Degree in IT\nApply now',
    );
  });

  it('ends the section at the next heading word', () => {
    expect(carveRequirementsFromDescription('Requirements\nSQL\nAbout you\nFriendly')).toBe('SQL');
  });

  it('ends the section at a Title Case line ending in a colon', () => {
    expect(carveRequirementsFromDescription('Who you are\nPatient\nWorking Hours:\n9 to 6')).toBe('Patient');
  });
});

describe('getJobSkills', () => {
  it('unwraps list items and coerces scalars', () => {
    expect(getJobSkills({ id_Job_Skills: ['Excel', { caption: 'SQL' }, 42, '', null] })).toEqual(['Excel', 'SQL', '42']);
  });

  it('wraps a lone scalar', () => {
    expect(getJobSkills({ Skills: 'Looker' })).toEqual(['Looker']);
  });

  it('returns an empty list when no skills are present', () => {
    expect(getJobSkills({ Title: 'Cook' })).toEqual([]);
    expect(getJobSkills(null)).toEqual([]);
  });
});

describe('getJobTitle / getCompanyName', () => {
  it('reads plain and caption-wrapped values', () => {
    expect(getJobTitle({ Title: ' Data Analyst ' })).toBe('Data Analyst');
    expect(getCompanyName({ CompanyName: { caption: 'Acme' } })).toBe('Acme');
    expect(getCompanyName({ company: 'Beta Pte Ltd' })).toBe('Beta Pte Ltd');
  });

  it('returns empty string when missing', () => {
    expect(getJobTitle({})).toBe('');
    expect(getCompanyName({})).toBe('');
  });
});
