import { describe, expect, it } from "vitest";
import { aggregateAnalysis, validateAnalysisInput } from "../../src/lib/analysis/aggregate";

const base = { dataSensitivity: 50, gdprCompliance: 6, ccpaCompliance: 6, retentionRisk: 2, sharingRisk: 2 };

describe("analysis aggregation", () => {
  it("truncates the averages and applies the score multiplier", () => {
    const result = aggregateAnalysis({ ...base, gdprCompliance: 4, ccpaCompliance: 3, retentionRisk: 2, sharingRisk: 3 });
    expect(result.overallScore).toBe(3);
    expect(result.overallRisk).toBe(2);
    expect(result.sealedScorePlaintext).toBe(30);
  });

  it("alerts below score five or at risk four", () => {
    expect(aggregateAnalysis({ ...base, gdprCompliance: 5, ccpaCompliance: 4 })).toMatchObject({ overallScore: 4, alert: true, reason: "Score 4 below 5" });
    expect(aggregateAnalysis({ ...base, gdprCompliance: 5, ccpaCompliance: 5 })).toMatchObject({ overallScore: 5, alert: false });
    expect(aggregateAnalysis({ ...base, retentionRisk: 4, sharingRisk: 4 })).toMatchObject({ overallRisk: 4, alert: true, reason: "Risk 4 at or above 4" });
    expect(aggregateAnalysis({ ...base, retentionRisk: 3, sharingRisk: 4 })).toMatchObject({ overallRisk: 3, alert: false });
  });

  it("explains alerts that trip both thresholds", () => {
    const result = aggregateAnalysis({ ...base, gdprCompliance: 0, ccpaCompliance: 1, retentionRisk: 5, sharingRisk: 5 });
    expect(result.reason).toBe("Score 0 below 5 and risk 5 at or above 4");
  });

  it("validates each input range", () => {
    expect(validateAnalysisInput(base)).toBeNull();
    expect(validateAnalysisInput({ ...base, dataSensitivity: 0 })).toBeNull();
    expect(validateAnalysisInput({ ...base, dataSensitivity: 101 })).toBe("Data sensitivity must be 0-100");
    expect(validateAnalysisInput({ ...base, ccpaCompliance: -1 })).toBe("Compliance scores must be 0-10");
    expect(validateAnalysisInput({ ...base, retentionRisk: 6 })).toBe("Retention risk must be 1-5");
    expect(validateAnalysisInput({ ...base, sharingRisk: 0 })).toBe("Sharing risk must be 1-5");
    expect(validateAnalysisInput({ ...base, sharingRisk: 1.5 })).toBe("Sharing risk must be 1-5");
  });
});
