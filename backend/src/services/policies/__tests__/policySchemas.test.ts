import { buildBuiltinPolicies } from "../builtinPolicies";
import {
    mixingPolicyDocumentSchema,
    mixingPolicyUpdateSchema,
    policyFromDocument,
    policyRuleDocumentSchema,
    policyToDocument,
    policyUpdateFromDocument,
} from "../policySchemas";

describe("policy documents", () => {
    it("fills rule defaults from a minimal document", () => {
        const rule = policyRuleDocumentSchema.parse({
            id: "tempo",
            name: "Tempo",
            policy_type: "energy",
            field: "bpm",
            operator: "within_range",
            value: [120, 128],
        });

        expect(rule).toEqual({
            id: "tempo",
            name: "Tempo",
            description: "",
            policy_type: "energy",
            field: "bpm",
            operator: "within_range",
            value: [120, 128],
            context: "track",
            priority: "medium",
            weight: 1.0,
            enabled: true,
            tolerance: 0,
            adaptive: false,
            time_sensitive: false,
            created_by: "user",
            tags: [],
            notes: "",
        });
    });

    it("rejects unknown operators and policy types", () => {
        const base = {
            id: "tempo",
            name: "Tempo",
            policy_type: "energy",
            field: "bpm",
            value: 125,
        };

        expect(policyRuleDocumentSchema.safeParse({ ...base, operator: "roughly" }).success).toBe(
            false,
        );
        expect(
            mixingPolicyDocumentSchema.safeParse({
                id: "p",
                name: "P",
                global_weights: { vibes: 0.5 },
            }).success,
        ).toBe(false);
    });

    it("rejects repeated rule-set and rule ids", () => {
        const rule = {
            id: "tempo",
            name: "Tempo",
            policy_type: "energy",
            field: "bpm",
            operator: "greater_than",
            value: 100,
        };
        const repeatedSets = mixingPolicyDocumentSchema.safeParse({
            id: "p",
            name: "P",
            rule_sets: [
                { id: "dup", name: "First", rules: [rule] },
                { id: "dup", name: "Second", rules: [rule] },
            ],
        });
        const repeatedRules = mixingPolicyDocumentSchema.safeParse({
            id: "p",
            name: "P",
            rule_sets: [{ id: "set", name: "Set", rules: [rule, rule] }],
        });

        expect(repeatedSets.success).toBe(false);
        expect(
            repeatedSets.success ? [] : repeatedSets.error.errors.map((issue) => issue.message),
        ).toEqual(["Duplicate rule set id 'dup'"]);
        expect(
            repeatedRules.success ? [] : repeatedRules.error.errors.map((issue) => issue.message),
        ).toEqual(["Duplicate rule id 'tempo'"]);
    });

    it("converts built-in policies to documents and back unchanged", () => {
        const [policy] = buildBuiltinPolicies().policies;

        const document = policyToDocument(policy);
        const restored = policyFromDocument(mixingPolicyDocumentSchema.parse(document));

        expect(document.rule_sets[0].rules[0].policy_type).toBe("harmonic");
        expect(document.global_weights).toEqual({ harmonic: 0.6, energy: 0.3, stylistic: 0.1 });
        expect(restored).toEqual(policy);
    });

    it("keeps only supplied fields in an update", () => {
        const updates = policyUpdateFromDocument(
            mixingPolicyUpdateSchema.parse({ name: "Renamed", strict_mode: true }),
        );

        expect(updates.name).toBe("Renamed");
        expect(updates.strictMode).toBe(true);
        expect(updates.ruleSets).toBeUndefined();
        expect(updates.globalWeights).toBeUndefined();
    });

    it("refuses updates to identity fields", () => {
        expect(mixingPolicyUpdateSchema.safeParse({ id: "other" }).success).toBe(false);
        expect(mixingPolicyUpdateSchema.safeParse({ created_by: "system" }).success).toBe(false);
    });
});

describe("built-in policies", () => {
    it("provides the three system policies and their rule sets", () => {
        const catalog = buildBuiltinPolicies();

        expect(catalog.policies.map((policy) => policy.id)).toEqual([
            "classic_dj",
            "modern_ai",
            "cultural_journey",
        ]);
        expect(catalog.ruleSets.map((ruleSet) => ruleSet.id)).toEqual([
            "classic_harmonic",
            "ai_stylistic",
            "cultural_journey",
        ]);
        expect(catalog.policies.every((policy) => policy.createdBy === "system")).toBe(true);
    });

    it("returns fresh copies on every call", () => {
        const first = buildBuiltinPolicies();
        first.policies[0].usageCount = 5;

        expect(buildBuiltinPolicies().policies[0].usageCount).toBe(0);
    });
});
