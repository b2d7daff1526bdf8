import { describe, it, expect } from 'vitest';
import { RuleProcessor } from '../../src/services/rules/RuleProcessor.js';
import { RuleSession } from '../../src/services/rules/RuleSession.js';
import { CatalogLoader } from '../../src/services/catalog/CatalogLoader.js';
import { RequirementMatcher } from '../../src/services/matching/RequirementMatcher.js';
import { COMPLEX_BUSINESS_REASON, DELIVERY_SIGNAGE_REASON } from '../../src/services/rules/stages/featureRules.js';
import { RequirementCategory } from '../../src/domain/entities/Requirement.js';
import { SpecialFeature } from '../../src/domain/entities/SpecialFeature.js';
import { DEFAULT_RULES, makeMatch, makeProfile, makeRequirement } from '../fixtures/requirements.js';

const ch5Extinguishers = makeRequirement({
  id: 'CH5_EXTINGUISHERS',
  chapter: 5,
  section: '5.5.1',
  category: RequirementCategory.FIRE_EQUIPMENT,
  title: 'מטפי כיבוי',
});
const ch6HoseReel = makeRequirement({
  id: 'CH6_HOSE_REEL',
  chapter: 6,
  section: '6.13.1',
  category: RequirementCategory.FIRE_EQUIPMENT,
  title: 'גלגלון כיבוי',
});
const ch5Certificate = makeRequirement({
  id: 'CH5_CERTIFICATE',
  chapter: 5,
  section: '5.8.1',
  category: RequirementCategory.CERTIFICATIONS,
  title: 'אישור תקינות',
});
const ch6Gas = makeRequirement({
  id: 'CH6_GAS',
  chapter: 6,
  section: '6.23.1',
  category: RequirementCategory.GAS,
  title: 'מערכת גז',
});
const ch6Signage = makeRequirement({
  id: 'CH6_SIGNAGE',
  chapter: 6,
  section: '6.18.1',
  category: RequirementCategory.SIGNAGE,
  title: 'שילוט מואר',
});

describe('RuleProcessor', () => {
  const processor = new RuleProcessor(DEFAULT_RULES);

  describe('threshold boundary', () => {
    it('prefers chapter 5 when the business sits exactly on the threshold', () => {
      const profile = makeProfile({ sizeSqm: 150, capacityPeople: 50, specialFeatures: [SpecialFeature.GAS_USAGE] });
      const matches = [makeMatch(ch5Extinguishers, 1), makeMatch(ch6HoseReel, 1), makeMatch(ch6Gas, 1)];

      const { matches: result, session } = processor.process(matches, profile);

      expect(result.map(m => m.requirement.id)).toEqual(['CH5_EXTINGUISHERS', 'CH6_GAS']);
      expect(session.conflicts()).toEqual([
        {
          keptRequirementId: 'CH5_EXTINGUISHERS',
          droppedRequirementId: 'CH6_HOSE_REEL',
          conflictType: 'threshold_boundary',
          basis: 'same_category',
          resolution: 'Business at chapter 5 threshold; prefer chapter 5 requirement',
        },
      ]);
    });

    it('triggers when only one dimension is on its threshold', () => {
      const profile = makeProfile({ sizeSqm: 150, capacityPeople: 80 });
      const matches = [makeMatch(ch5Extinguishers, 1), makeMatch(ch6HoseReel, 1)];

      const { matches: result, session } = processor.process(matches, profile);

      expect(result.map(m => m.requirement.id)).toEqual(['CH5_EXTINGUISHERS']);
      expect(session.conflicts().map(c => c.conflictType)).toEqual(['threshold_boundary']);
    });

    it('treats identical titles across chapters as a conflict', () => {
      const profile = makeProfile({ sizeSqm: 150, capacityPeople: 50 });
      const general5 = makeRequirement({ id: 'G5', chapter: 5, section: '5.20', title: 'פינוי פסולת' });
      const general6 = makeRequirement({ id: 'G6', chapter: 6, section: '6.40', title: 'פינוי פסולת' });

      const { matches: result, session } = processor.process(
        [makeMatch(general5, 3), makeMatch(general6, 3)],
        profile
      );

      expect(result.map(m => m.requirement.id)).toEqual(['G5']);
      expect(session.conflicts()[0]?.basis).toBe('identical_title');
    });
  });

  describe('chapter reconciliation', () => {
    it('prefers chapter 6 one unit above the size threshold', () => {
      const profile = makeProfile({ sizeSqm: 151, capacityPeople: 40 });
      const matches = [makeMatch(ch5Extinguishers, 1), makeMatch(ch6HoseReel, 1)];

      const { matches: result, session } = processor.process(matches, profile);

      expect(result.map(m => m.requirement.id)).toEqual(['CH6_HOSE_REEL']);
      expect(session.conflicts()).toEqual([
        {
          keptRequirementId: 'CH6_HOSE_REEL',
          droppedRequirementId: 'CH5_EXTINGUISHERS',
          conflictType: 'chapter_overlap',
          basis: 'same_category',
          resolution: 'Prefer chapter 6 requirement',
        },
      ]);
    });

    it('prefers chapter 6 one unit above the capacity threshold', () => {
      const profile = makeProfile({ sizeSqm: 120, capacityPeople: 51 });

      const { matches: result } = processor.process(
        [makeMatch(ch5Extinguishers, 1), makeMatch(ch6HoseReel, 1)],
        profile
      );

      expect(result.map(m => m.requirement.id)).toEqual(['CH6_HOSE_REEL']);
    });

    it('prefers chapter 5 below both thresholds', () => {
      const profile = makeProfile({ sizeSqm: 100, capacityPeople: 40 });

      const { matches: result, session } = processor.process(
        [makeMatch(ch5Extinguishers, 1), makeMatch(ch6HoseReel, 1)],
        profile
      );

      expect(result.map(m => m.requirement.id)).toEqual(['CH5_EXTINGUISHERS']);
      expect(session.conflicts()[0]?.resolution).toBe('Prefer chapter 5 requirement');
    });

    it('keeps non-overlapping categories from both chapters', () => {
      const profile = makeProfile({ sizeSqm: 200, capacityPeople: 80, specialFeatures: [SpecialFeature.GAS_USAGE] });

      const { matches: result, session } = processor.process(
        [makeMatch(ch5Certificate, 1), makeMatch(ch6Gas, 1)],
        profile
      );

      expect(result.map(m => m.requirement.id)).toEqual(['CH5_CERTIFICATE', 'CH6_GAS']);
      expect(session.conflicts()).toEqual([]);
    });

    it('leaves other chapters untouched', () => {
      const profile = makeProfile({ sizeSqm: 200, capacityPeople: 80 });
      const appendix = makeRequirement({
        id: 'CH7_FIRE',
        chapter: 7,
        section: '7.1',
        category: RequirementCategory.FIRE_EQUIPMENT,
      });

      const { matches: result } = processor.process(
        [makeMatch(ch5Extinguishers, 1), makeMatch(ch6HoseReel, 1), makeMatch(appendix, 1)],
        profile
      );

      expect(result.map(m => m.requirement.id)).toEqual(['CH6_HOSE_REEL', 'CH7_FIRE']);
    });
  });

  describe('feature rules', () => {
    it('forces gas requirements to critical for gas users', () => {
      const profile = makeProfile({ sizeSqm: 200, capacityPeople: 80, specialFeatures: [SpecialFeature.GAS_USAGE] });

      const { matches: result } = processor.process([makeMatch(ch6Gas, 2)], profile);

      expect(result[0]?.priority).toBe(1);
    });

    it('notes delivery on signage requirements', () => {
      const profile = makeProfile({ sizeSqm: 200, capacityPeople: 80, specialFeatures: [SpecialFeature.DELIVERY] });

      const { matches: result } = processor.process([makeMatch(ch6Signage, 2, ['existing'])], profile);

      expect(result[0]?.priority).toBe(2);
      expect(result[0]?.matchReasons).toEqual(['existing', DELIVERY_SIGNAGE_REASON]);
    });

    it('escalates every non-critical match for a complex business', () => {
      const profile = makeProfile({
        sizeSqm: 300,
        capacityPeople: 150,
        specialFeatures: [SpecialFeature.GAS_USAGE, SpecialFeature.DELIVERY, SpecialFeature.ALCOHOL],
      });
      const general = makeRequirement({ id: 'CH6_GENERAL', chapter: 6, section: '6.30.1' });

      const { matches: result } = processor.process(
        [makeMatch(ch6HoseReel, 1), makeMatch(ch6Signage, 3), makeMatch(general, 2)],
        profile
      );

      expect(result.map(m => [m.requirement.id, m.priority])).toEqual([
        ['CH6_HOSE_REEL', 1],
        ['CH6_GENERAL', 1],
        ['CH6_SIGNAGE', 2],
      ]);
      expect(result[0]?.matchReasons).toEqual([]);
      expect(result[1]?.matchReasons).toEqual([COMPLEX_BUSINESS_REASON]);
      expect(result[2]?.matchReasons).toEqual([DELIVERY_SIGNAGE_REASON, COMPLEX_BUSINESS_REASON]);
    });

    it('does not escalate below the complexity threshold', () => {
      const profile = makeProfile({
        sizeSqm: 300,
        capacityPeople: 150,
        specialFeatures: [SpecialFeature.ALCOHOL, SpecialFeature.MEAT],
      });

      const { matches: result } = processor.process([makeMatch(ch6Signage, 3)], profile);

      expect(result[0]?.priority).toBe(3);
      expect(result[0]?.matchReasons).toEqual([]);
    });

    it('honours a custom complexity threshold', () => {
      const strict = new RuleProcessor({ ...DEFAULT_RULES, complexFeatureCount: 2 });
      const profile = makeProfile({
        sizeSqm: 300,
        capacityPeople: 150,
        specialFeatures: [SpecialFeature.ALCOHOL, SpecialFeature.MEAT],
      });

      const { matches: result } = strict.process([makeMatch(ch6Signage, 3)], profile);

      expect(result[0]?.priority).toBe(2);
      expect(result[0]?.matchReasons).toEqual([COMPLEX_BUSINESS_REASON]);
    });
  });

  describe('deduplication', () => {
    it('keeps the first occurrence of a requirement id', () => {
      const profile = makeProfile({ sizeSqm: 200, capacityPeople: 80 });
      const matches = [
        makeMatch(ch6HoseReel, 1, ['first']),
        makeMatch(ch6Signage, 2),
        makeMatch(ch6HoseReel, 3, ['second']),
      ];

      const { matches: result } = processor.process(matches, profile);

      expect(result.map(m => m.requirement.id)).toEqual(['CH6_HOSE_REEL', 'CH6_SIGNAGE']);
      expect(result[0]?.priority).toBe(1);
      expect(result[0]?.matchReasons).toEqual(['first']);
    });

    it('is stable when processed twice', () => {
      const profile = makeProfile({ sizeSqm: 200, capacityPeople: 80 });
      const once = processor.process([makeMatch(ch6HoseReel, 1), makeMatch(ch6HoseReel, 1)], profile);
      const twice = processor.process(once.matches, profile);

      expect(twice.matches.map(m => m.requirement.id)).toEqual(['CH6_HOSE_REEL']);
    });
  });

  describe('completeness', () => {
    it('warns when mandatory categories are missing', () => {
      const profile = makeProfile({ sizeSqm: 200, capacityPeople: 80 });

      const { session } = processor.process([makeMatch(ch6Signage, 2)], profile);

      expect(session.warnings()).toEqual([
        {
          code: 'MISSING_MANDATORY_CATEGORY',
          message: 'Missing mandatory categories: fire_equipment, certifications',
          details: { missing: ['fire_equipment', 'certifications'] },
        },
      ]);
    });

    it('warns when a gas user has no gas requirements', () => {
      const profile = makeProfile({ sizeSqm: 100, capacityPeople: 40, specialFeatures: [SpecialFeature.GAS_USAGE] });

      const { session } = processor.process([makeMatch(ch5Extinguishers, 1), makeMatch(ch5Certificate, 1)], profile);

      expect(session.warnings()).toEqual([
        {
          code: 'GAS_WITHOUT_GAS_REQUIREMENTS',
          message: 'Gas usage specified but no gas requirements found',
        },
      ]);
    });

    it('keeps the matches even when warnings are raised', () => {
      const profile = makeProfile({ sizeSqm: 200, capacityPeople: 80 });

      const { matches: result } = processor.process([makeMatch(ch6Signage, 2)], profile);

      expect(result).toHaveLength(1);
    });
  });

  it('never mutates its input', () => {
    const profile = makeProfile({
      sizeSqm: 300,
      capacityPeople: 150,
      specialFeatures: [SpecialFeature.GAS_USAGE, SpecialFeature.DELIVERY, SpecialFeature.ALCOHOL],
    });
    const signage = makeMatch(ch6Signage, 3, ['original']);
    const gas = makeMatch(ch6Gas, 2);
    const input = [signage, gas];

    processor.process(input, profile);

    expect(input).toEqual([signage, gas]);
    expect(signage.priority).toBe(3);
    expect(signage.matchReasons).toEqual(['original']);
    expect(gas.priority).toBe(2);
  });

  it('never adds requirements that were not matched', () => {
    const profile = makeProfile({ sizeSqm: 150, capacityPeople: 50, specialFeatures: [SpecialFeature.DELIVERY] });
    const input = [makeMatch(ch5Extinguishers, 1), makeMatch(ch6HoseReel, 1), makeMatch(ch6Signage, 2)];
    const ids = new Set(input.map(m => m.requirement.id));

    const { matches: result } = processor.process(input, profile);

    expect(result.every(m => ids.has(m.requirement.id))).toBe(true);
  });
});

describe('catalog rule thresholds', () => {
  it('drive both matching and rule stages when run separately', () => {
    const catalog = new CatalogLoader(DEFAULT_RULES).parse({
      rule_thresholds: { small_business_max_sqm: 120 },
      requirements: [
        { requirement_id: 'A5', chapter: 5, section: '5.5', category: 'fire_equipment', title_hebrew: 'מטפים' },
        { requirement_id: 'B6', chapter: 6, section: '6.13', category: 'fire_equipment', title_hebrew: 'גלגלון' },
      ],
    });
    const profile = makeProfile({ sizeSqm: 130, capacityPeople: 30 });

    const rawMatches = new RequirementMatcher().match(profile, catalog);
    const { matches, session } = new RuleProcessor(catalog.rules).process(rawMatches, profile);

    expect(rawMatches.map(m => m.requirement.id)).toEqual(['A5', 'B6']);
    expect(matches.map(m => m.requirement.id)).toEqual(['B6']);
    expect(session.conflicts()[0]?.resolution).toBe('Prefer chapter 6 requirement');
  });

  it('treats a size on a custom threshold as the chapter 5 boundary', () => {
    const processor = new RuleProcessor({ ...DEFAULT_RULES, smallBusinessMaxSqm: 120 });
    const profile = makeProfile({ sizeSqm: 120, capacityPeople: 80 });

    const { matches, session } = processor.process(
      [makeMatch(ch5Extinguishers, 1), makeMatch(ch6HoseReel, 1)],
      profile
    );

    expect(matches.map(m => m.requirement.id)).toEqual(['CH5_EXTINGUISHERS']);
    expect(session.conflicts()[0]?.conflictType).toBe('threshold_boundary');
  });
});

describe('RuleSession', () => {
  const processor = new RuleProcessor(DEFAULT_RULES);
  const profile = makeProfile({ sizeSqm: 151, capacityPeople: 40 });
  const matches = [makeMatch(ch5Extinguishers, 1), makeMatch(ch6HoseReel, 1)];

  it('accumulates entries across runs until reset', () => {
    const session = new RuleSession('session-test');

    processor.process(matches, profile, session);
    processor.process(matches, profile, session);

    expect(session.id).toBe('session-test');
    expect(session.conflicts()).toHaveLength(2);
    expect(session.warnings()).toHaveLength(2);

    session.reset();

    expect(session.conflicts()).toEqual([]);
    expect(session.warnings()).toEqual([]);
  });

  it('starts each run with a fresh session by default', () => {
    const first = processor.process(matches, profile);
    const second = processor.process(matches, profile);

    expect(first.session).not.toBe(second.session);
    expect(second.session.conflicts()).toHaveLength(1);
    expect(first.session.id).toMatch(/^session-[0-9a-f-]{36}$/);
  });

  it('returns copies of its logs', () => {
    const { session } = processor.process(matches, profile);

    session.conflicts().pop();

    expect(session.conflicts()).toHaveLength(1);
  });
});
