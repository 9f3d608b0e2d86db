/**
 * Static catalogues shipped in data/: the technology keyword catalogue,
 * the billing line templates and the recommendation playbook. Each is
 * validated on first load.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

const TechEntrySchema = z.object({
  technology: z.string().min(1),
  category: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
});

const PlaybookEntrySchema = z.object({
  /** Billing service the entry applies to; `*` applies to any service. */
  service: z.string().min(1),
  title: z.string().min(1),
  recommendation_type: z.string().min(1),
  savings_pct: z.number().min(0).max(1),
  description: z.string(),
  implementation_effort: z.enum(['low', 'medium', 'high']),
  risk_level: z.enum(['low', 'medium', 'high']),
  steps: z.array(z.string()),
  cloud_providers: z.array(z.string()).min(1),
});

const BillingLineSchema = z.object({
  role: z.string().regex(/^[a-z0-9-]+$/),
  usage_type: z.string().min(1),
  unit: z.string().min(1),
  quantity: z.tuple([z.number().nonnegative(), z.number().nonnegative()]),
  /** `{tech}` is replaced with the technology behind the service. */
  desc: z.string().min(1),
});

const BillingTemplateSchema = z.object({
  service: z.string().min(1),
  prefix: z.string().regex(/^[a-z0-9]+$/),
  weight: z.number().positive(),
  lines: z.array(BillingLineSchema).min(1),
});

export type TechEntry = z.infer<typeof TechEntrySchema>;
export type PlaybookEntry = z.infer<typeof PlaybookEntrySchema>;
export type BillingTemplate = z.infer<typeof BillingTemplateSchema>;
export type BillingLineTemplate = z.infer<typeof BillingLineSchema>;

function loadDataFile<T>(fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const url = new URL(`../../data/${fileName}`, import.meta.url);
  return schema.parse(JSON.parse(readFileSync(url, 'utf-8')));
}

let techCatalog: readonly TechEntry[] | undefined;
let playbook: readonly PlaybookEntry[] | undefined;
let billingTemplates: readonly BillingTemplate[] | undefined;

export function getTechCatalog(): readonly TechEntry[] {
  techCatalog ??= loadDataFile('tech-catalog.json', z.array(TechEntrySchema));
  return techCatalog;
}

export function getPlaybook(): readonly PlaybookEntry[] {
  playbook ??= loadDataFile('recommendation-playbook.json', z.array(PlaybookEntrySchema));
  return playbook;
}

export function getBillingTemplates(): readonly BillingTemplate[] {
  billingTemplates ??= loadDataFile('billing-templates.json', z.array(BillingTemplateSchema));
  return billingTemplates;
}
