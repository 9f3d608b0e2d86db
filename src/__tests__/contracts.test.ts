import { describe, it, expect } from 'vitest';
import {
  BillingDocumentSchema,
  BillingMonthSchema,
  BillingRecordSchema,
  CostReportSchema,
  ProjectProfileSchema,
  RecommendationSchema,
  StageSummarySchema,
} from '../contracts/index.js';
import { analyze } from '../analysis/index.js';
import { makeLedger, makeRecord, SHOP_PROFILE, standardLedger } from './fixtures.js';

describe('Contracts', () => {
  describe('ProjectProfileSchema', () => {
    it('should validate a valid profile', () => {
      expect(ProjectProfileSchema.safeParse(SHOP_PROFILE).success).toBe(true);
    });

    it('should reject a zero budget', () => {
      expect(ProjectProfileSchema.safeParse({ ...SHOP_PROFILE, budget: 0 }).success).toBe(false);
    });

    it('should strip unknown fields', () => {
      const result = ProjectProfileSchema.parse({ ...SHOP_PROFILE, owner: 'someone' });
      expect(result).toEqual(SHOP_PROFILE);
    });
  });

  describe('BillingRecordSchema', () => {
    it('should validate a valid record', () => {
      expect(BillingRecordSchema.safeParse(makeRecord()).success).toBe(true);
    });

    it('should reject a negative cost', () => {
      expect(BillingRecordSchema.safeParse(makeRecord({ cost_inr: -0.01 })).success).toBe(false);
    });

    it('should reject an empty resource id', () => {
      expect(BillingRecordSchema.safeParse(makeRecord({ resource_id: '' })).success).toBe(false);
    });
  });

  describe('BillingDocumentSchema', () => {
    it('should accept 12 to 20 records', () => {
      expect(BillingDocumentSchema.safeParse(standardLedger()).success).toBe(true);
      const twenty = makeLedger(Array.from({ length: 20 }, () => ['Compute', 10] as const));
      expect(BillingDocumentSchema.safeParse(twenty).success).toBe(true);
    });

    it('should reject too few or too many records', () => {
      expect(BillingDocumentSchema.safeParse(standardLedger().slice(0, 11)).success).toBe(false);
      const many = makeLedger(Array.from({ length: 21 }, () => ['Compute', 10] as const));
      expect(BillingDocumentSchema.safeParse(many).success).toBe(false);
    });
  });

  describe('BillingMonthSchema', () => {
    it('should accept YYYY-MM only', () => {
      expect(BillingMonthSchema.safeParse('2026-03').success).toBe(true);
      expect(BillingMonthSchema.safeParse('March 2026').success).toBe(false);
      expect(BillingMonthSchema.safeParse('2026-13').success).toBe(false);
    });
  });

  describe('RecommendationSchema', () => {
    it('should accept optional detail fields', () => {
      const result = RecommendationSchema.safeParse({
        title: 'Tier cold objects',
        service: 'Storage',
        potential_savings: 1800,
        recommendation_type: 'lifecycle',
        description: 'Move old objects to infrequent access',
        steps: ['Enable lifecycle rules'],
        cloud_providers: ['AWS'],
      });
      expect(result.success).toBe(true);
    });

    it('should reject an empty recommendation type', () => {
      const result = RecommendationSchema.safeParse({
        title: 'x',
        service: 'Storage',
        potential_savings: 1,
        recommendation_type: '',
        description: '',
      });
      expect(result.success).toBe(false);
    });
  });

  describe('CostReportSchema', () => {
    it('should require between 6 and 10 recommendations', () => {
      const recommendation = {
        title: 'Tune',
        service: 'Compute',
        potential_savings: 10,
        recommendation_type: 'rightsizing',
        description: '',
      };
      const report = (count: number) => ({
        project_name: 'Shop',
        analysis: analyze(standardLedger(), 50000),
        recommendations: Array.from({ length: count }, () => recommendation),
      });

      expect(CostReportSchema.safeParse(report(6)).success).toBe(true);
      expect(CostReportSchema.safeParse(report(5)).success).toBe(false);
      expect(CostReportSchema.safeParse(report(11)).success).toBe(false);
    });
  });

  describe('StageSummarySchema', () => {
    it('should reject an unknown origin', () => {
      const summary = { stage: 'billing', origin: 'cache', attempts: 1, violations: [], artifact: 'mock_billing.json' };
      expect(StageSummarySchema.safeParse(summary).success).toBe(false);
      expect(StageSummarySchema.safeParse({ ...summary, origin: 'ai' }).success).toBe(true);
    });
  });
});
