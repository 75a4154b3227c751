export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/** Prices per 1,000 tokens, in whatever currency the caller bills in. */
export interface TokenPricing {
  inputPer1k: number;
  outputPer1k: number;
}

export interface CostEstimate {
  inputCost: number;
  outputCost: number;
  totalCost: number;
}

export interface UsageSnapshot extends TokenUsage {
  /** Model calls made. */
  requests: number;
  /** Present when the runner was given {@link TokenPricing}. */
  cost?: CostEstimate;
}

/** Flat rates for a rough estimate when no model-specific prices are known. */
export const DEFAULT_TOKEN_PRICING: TokenPricing = { inputPer1k: 0.01, outputPer1k: 0.03 };

const roundCost = (value: number): number => Math.round(value * 1e6) / 1e6;

export function estimateCost(usage: TokenUsage, pricing: TokenPricing): CostEstimate {
  const inputCost = (usage.inputTokens / 1000) * pricing.inputPer1k;
  const outputCost = (usage.outputTokens / 1000) * pricing.outputPer1k;
  return {
    inputCost: roundCost(inputCost),
    outputCost: roundCost(outputCost),
    totalCost: roundCost(inputCost + outputCost),
  };
}

/**
 * Running token totals for one run. A nested agent-tool run's totals are
 * created with the caller's as parent, so every call it records also counts
 * toward the caller, whether the nested run succeeds or not.
 */
export class Usage {
  private requests = 0;
  private inputTokens = 0;
  private outputTokens = 0;
  private totalTokens = 0;

  constructor(
    private readonly parent?: Usage,
    private readonly pricing?: TokenPricing,
  ) {}

  /** Records one model call, with its reported usage when the backend gave any. */
  add(usage?: TokenUsage): void {
    this.requests++;
    if (usage) {
      this.inputTokens += usage.inputTokens;
      this.outputTokens += usage.outputTokens;
      this.totalTokens += usage.totalTokens || usage.inputTokens + usage.outputTokens;
    }
    this.parent?.add(usage);
  }

  snapshot(): UsageSnapshot {
    const totals: UsageSnapshot = {
      requests: this.requests,
      inputTokens: this.inputTokens,
      outputTokens: this.outputTokens,
      totalTokens: this.totalTokens,
    };
    return this.pricing ? { ...totals, cost: estimateCost(totals, this.pricing) } : totals;
  }
}
