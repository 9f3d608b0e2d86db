/**
 * Stage 1: project profile extraction.
 */

import { profileConstraint } from '../generation/constraints.js';
import { isRecord } from '../generation/validator.js';
import type { GenerationRequest } from '../generation/types.js';
import {
  deriveProjectName,
  extractBudget,
  firstSentence,
  isGroundedRequirement,
  NOT_SPECIFIED,
} from '../signals/index.js';
import type { ProjectProfile, TechStack } from '../contracts/index.js';

export const PROFILE_MAX_TOKENS = 800;

export function buildProfilePrompt(description: string): string {
  return `You are an expert cloud architect.

Extract a STRICT JSON object from the project description below.

RULES:
- Output ONLY valid JSON (no markdown, no comments, no extra text)
- Extract ONLY technologies explicitly mentioned in the description; do not invent any
- budget MUST be a number (INR per month)

REQUIRED JSON STRUCTURE:
{
  "name": "Concise project name (2-4 words)",
  "budget": 0,
  "description": "One-line summary of the project",
  "tech_stack": {},
  "non_functional_requirements": []
}

TECH STACK RULES:
- Populate tech_stack as layer -> technology pairs, e.g. "frontend": "React"
- Leave out layers the description does not mention; no empty values

NON-FUNCTIONAL REQUIREMENTS RULES:
- Only requirements and metrics stated in the text: data volume (TB/PB), traffic, compliance (HIPAA), availability
- Title Case strings; [] when nothing is stated

BUDGET RULE:
- If stated, extract it exactly
- Otherwise estimate: small project = 10000, medium = 50000

Project Description:
${description}

Return ONLY the JSON object.`;
}

function groundTechStack(stack: unknown, text: string): unknown {
  if (!isRecord(stack)) return stack;
  const lower = text.toLowerCase();
  const grounded: TechStack = {};
  for (const [layer, tool] of Object.entries(stack)) {
    grounded[layer] = typeof tool === 'string' && tool.trim() && lower.includes(tool.toLowerCase()) ? tool : NOT_SPECIFIED;
  }
  return grounded;
}

function groundRequirements(requirements: unknown, text: string): unknown {
  if (!Array.isArray(requirements)) return requirements;
  const kept: string[] = [];
  for (const requirement of requirements) {
    if (typeof requirement !== 'string') continue;
    const { grounded, label } = isGroundedRequirement(requirement, text);
    if (grounded && !kept.includes(label)) kept.push(label);
  }
  return kept;
}

function coerceBudget(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const parsed = Number(value.replace(/[₹,\s]/g, ''));
  return Number.isFinite(parsed) ? parsed : value;
}

/**
 * Ground a model-extracted profile in the description it came from.
 * A budget stated in the text beats the model's; technologies the text
 * never names become "Not Specified"; requirements without evidence in
 * the text are dropped. The description is the input's first sentence.
 */
export function normalizeProfile(candidate: unknown, description: string): unknown {
  if (!isRecord(candidate)) return candidate;

  const budget = extractBudget(description) ?? coerceBudget(candidate.budget ?? candidate.budget_inr_per_month);
  const name = typeof candidate.name === 'string' && candidate.name.trim() ? candidate.name.trim() : deriveProjectName(description);

  return {
    name,
    budget,
    description: firstSentence(description) || candidate.description,
    tech_stack: groundTechStack(candidate.tech_stack, description),
    non_functional_requirements: groundRequirements(candidate.non_functional_requirements, description),
  };
}

export function profileRequest(description: string): GenerationRequest<ProjectProfile> {
  return {
    stage: 'profile',
    prompt: buildProfilePrompt(description),
    constraint: profileConstraint(),
    maxTokens: PROFILE_MAX_TOKENS,
    fallback: { stage: 'profile', context: { description } },
    normalize: (candidate) => normalizeProfile(candidate, description),
  };
}
