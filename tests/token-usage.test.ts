import { describe, it, expect } from 'vitest';
import { calculateCost, TokenUsageTracker, type TokenUsage, type PricingConfig } from '../src/types/token-usage';

describe('Token Usage Calculation', () => {
    it('should calculate cost correctly when pricing provided', () => {
        const usage: TokenUsage = {
            inputTokens: 1_000_000,
            outputTokens: 1_000_000
        };
        const pricing: PricingConfig = {
            inputPricePerMillion: 5.0,
            outputPricePerMillion: 15.0
        };

        expect(calculateCost(usage, pricing)).toBe(20.0);
    });

    it('should calculate cost correctly for partial millions', () => {
        const usage: TokenUsage = {
            inputTokens: 500_000, // 0.5 * 10 = 5
            outputTokens: 100_000 // 0.1 * 30 = 3
        };
        const pricing: PricingConfig = {
            inputPricePerMillion: 10.0,
            outputPricePerMillion: 30.0
        };

        expect(calculateCost(usage, pricing)).toBe(8.0);
    });

    it('should return undefined if pricing is undefined', () => {
        const usage: TokenUsage = { inputTokens: 100, outputTokens: 100 };
        expect(calculateCost(usage, undefined)).toBeUndefined();
    });

    it('should return undefined if either price is missing', () => {
        const usage: TokenUsage = { inputTokens: 100, outputTokens: 100 };
        expect(calculateCost(usage, { outputPricePerMillion: 10.0 })).toBeUndefined();
        expect(calculateCost(usage, { inputPricePerMillion: 10.0 })).toBeUndefined();
    });

    it('should handle zero tokens', () => {
        const usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };
        const pricing: PricingConfig = { inputPricePerMillion: 10, outputPricePerMillion: 10 };
        expect(calculateCost(usage, pricing)).toBe(0);
    });
});

describe('TokenUsageTracker', () => {
    it('should sum usage across calls', () => {
        const tracker = new TokenUsageTracker();
        tracker.record({ inputTokens: 120, outputTokens: 30 });
        tracker.record({ inputTokens: 80, outputTokens: 20 });

        expect(tracker.stats()).toEqual({ totalInputTokens: 200, totalOutputTokens: 50 });
    });

    it('should ignore calls without usage', () => {
        const tracker = new TokenUsageTracker();
        tracker.record(undefined);

        expect(tracker.stats()).toEqual({ totalInputTokens: 0, totalOutputTokens: 0 });
    });

    it('should include cost when pricing is configured', () => {
        const tracker = new TokenUsageTracker({ inputPricePerMillion: 10, outputPricePerMillion: 30 });
        tracker.record({ inputTokens: 500_000, outputTokens: 100_000 });

        expect(tracker.stats()).toEqual({ totalInputTokens: 500_000, totalOutputTokens: 100_000, totalCost: 8 });
    });
});
