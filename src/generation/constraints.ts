/**
 * Structural constraints per stage.
 *
 * A constraint states what "valid" means for a stage's document: its
 * top-level shape, how many items a collection may hold, which fields
 * each item needs and of what type. Once those checks pass, the typed
 * contract schema parses the document into its TypeScript shape.
 */

import type { z } from 'zod';
import {
  ProjectProfileSchema,
  BillingDocumentSchema,
  RecommendationListSchema,
  type StageKind,
  type ProjectProfile,
  type BillingDocument,
  type Recommendation,
} from '../contracts/index.js';

export type FieldType =
  | 'string'
  | 'number'
  | 'non-negative-number'
  | 'positive-number'
  | 'string-list'
  | 'string-map';

export interface ItemCountRange {
  min: number;
  max: number;
}

export interface SchemaConstraint<T> {
  readonly stage: StageKind;
  /** `collection`: top level is an array of items. `record`: a single object. */
  readonly shape: 'collection' | 'record';
  readonly itemCount?: ItemCountRange;
  readonly requiredFields: readonly string[];
  readonly fieldTypes: Readonly<Record<string, FieldType>>;
  /** Fields whose value must come from a closed set. */
  readonly allowedValues?: Readonly<Record<string, readonly string[]>>;
  /** Fields whose value must differ across items. */
  readonly uniqueFields?: readonly string[];
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export const BILLING_ITEM_RANGE: ItemCountRange = { min: 12, max: 20 };
export const RECOMMENDATION_ITEM_RANGE: ItemCountRange = { min: 6, max: 10 };

export function profileConstraint(): SchemaConstraint<ProjectProfile> {
  return {
    stage: 'profile',
    shape: 'record',
    requiredFields: ['name', 'budget', 'description', 'tech_stack', 'non_functional_requirements'],
    fieldTypes: {
      name: 'string',
      budget: 'positive-number',
      description: 'string',
      tech_stack: 'string-map',
      non_functional_requirements: 'string-list',
    },
    schema: ProjectProfileSchema,
  };
}

export function billingConstraint(): SchemaConstraint<BillingDocument> {
  return {
    stage: 'billing',
    shape: 'collection',
    itemCount: BILLING_ITEM_RANGE,
    requiredFields: [
      'month',
      'service',
      'resource_id',
      'region',
      'usage_type',
      'usage_quantity',
      'unit',
      'cost_inr',
      'desc',
    ],
    fieldTypes: {
      month: 'string',
      service: 'string',
      resource_id: 'string',
      region: 'string',
      usage_type: 'string',
      usage_quantity: 'non-negative-number',
      unit: 'string',
      cost_inr: 'non-negative-number',
      desc: 'string',
    },
    uniqueFields: ['resource_id'],
    schema: BillingDocumentSchema,
  };
}

/**
 * Recommendations may only name services that appear in the bill.
 */
export function recommendationConstraint(billedServices: readonly string[]): SchemaConstraint<Recommendation[]> {
  return {
    stage: 'analysis',
    shape: 'collection',
    itemCount: RECOMMENDATION_ITEM_RANGE,
    requiredFields: ['title', 'service', 'potential_savings', 'recommendation_type', 'description'],
    fieldTypes: {
      title: 'string',
      service: 'string',
      potential_savings: 'non-negative-number',
      recommendation_type: 'string',
      description: 'string',
    },
    allowedValues: { service: [...billedServices] },
    schema: RecommendationListSchema,
  };
}
