import { createLogger, type StructuredLogger } from '../runner/index.js';
import type { GatewayOutcome, InferenceGateway, SendOptions } from '../generation/gateway.js';
import type { BillingRecord, ProjectProfile } from '../contracts/index.js';

export const BILLING_MONTH = '2026-03';

export function makeRecord(overrides: Partial<BillingRecord> = {}): BillingRecord {
  return {
    month: BILLING_MONTH,
    service: 'Compute',
    resource_id: 'i-test-01',
    region: 'ap-south-1',
    usage_type: 'BoxUsage:t3.medium',
    usage_quantity: 720,
    unit: 'Hrs',
    cost_inr: 1000,
    desc: 'Test line',
    ...overrides,
  };
}

/** One record per [service, cost] pair, resource ids res-1, res-2, ... */
export function makeLedger(entries: ReadonlyArray<readonly [string, number]>): BillingRecord[] {
  return entries.map(([service, cost], i) => makeRecord({ service, cost_inr: cost, resource_id: `res-${i + 1}` }));
}

/** Twelve lines: Compute x5, Database x3, Storage x2, Networking, Monitoring. */
export function standardLedger(): BillingRecord[] {
  return makeLedger([
    ['Compute', 8000],
    ['Compute', 6000],
    ['Compute', 5000],
    ['Compute', 3000],
    ['Compute', 2000],
    ['Database', 7000],
    ['Database', 4000],
    ['Database', 3000],
    ['Storage', 4000],
    ['Storage', 2000],
    ['Networking', 4000],
    ['Monitoring', 2000],
  ]);
}

export const SHOP_PROFILE: ProjectProfile = {
  name: 'Shop Backend',
  budget: 50000,
  description: 'An online shop backend',
  tech_stack: { backend: 'Node.js', database: 'PostgreSQL', storage: 'object storage' },
  non_functional_requirements: ['Scalability'],
};

export function silentLogger(): StructuredLogger {
  return createLogger({ module: 'test', silent: true });
}

type Reply = GatewayOutcome | ((prompt: string) => GatewayOutcome);

/**
 * Gateway that replays scripted outcomes in order; the last one repeats.
 */
export class ScriptedGateway implements InferenceGateway {
  readonly prompts: string[] = [];
  readonly options: SendOptions[] = [];

  constructor(private readonly replies: readonly Reply[]) {}

  async send(prompt: string, options: SendOptions): Promise<GatewayOutcome> {
    this.prompts.push(prompt);
    this.options.push(options);
    const reply = this.replies[Math.min(this.prompts.length - 1, this.replies.length - 1)];
    return typeof reply === 'function' ? reply(prompt) : reply;
  }
}

export const text = (value: string): GatewayOutcome => ({ ok: true, text: value });
export const json = (value: unknown): GatewayOutcome => text(JSON.stringify(value));
export const serviceError = (status = 503): GatewayOutcome => ({
  ok: false,
  error: { kind: 'service', message: `${status} Service Unavailable`, status },
});

export const noSleep = async (): Promise<void> => {};
