import * as fs from "fs";
import * as path from "path";
import type { Track, TrackMetadataMap } from "@mixflow/track-analysis-contract";
import { config } from "../../config";
import {
    AppError,
    ErrorCategory,
    ErrorCode,
    PolicyConfigurationError,
    PolicyNotFoundError,
    getErrorMessage,
    wrapPolicyIoError,
} from "../../utils/errors";
import { createLogger, logErrorWithContext } from "../../utils/logger";
import { buildBuiltinPolicies } from "./builtinPolicies";
import { PolicyRuleEngine, policyRuleEngine } from "./policyRuleEngine";
import {
    mixingPolicyDocumentSchema,
    policyFromDocument,
    policyStoreDocumentSchema,
    policyToDocument,
    ruleSetFromDocument,
    ruleSetToDocument,
} from "./policySchemas";
import type {
    MixingPolicy,
    MixingPolicyUpdate,
    PolicyApplicationResult,
    PolicyContext,
    PolicyRuleSet,
} from "./policyTypes";
import { findDuplicatePolicyIds } from "./policyTypes";

const log = createLogger("Policies.Manager");

const SYSTEM_OWNER = "system";
const USER_OWNER = "user";
export const POLICY_STORE_FILENAME = "policies.json";

export interface PolicyManagerOptions {
    configDir: string;
    ruleEngine?: PolicyRuleEngine;
    now?: () => Date;
}

function readJsonFile(filePath: string): unknown {
    return JSON.parse(fs.readFileSync(filePath, "utf-8"));
}

function assertUniqueIds(policyId: string, ruleSets: PolicyRuleSet[]): void {
    const duplicateIds = findDuplicatePolicyIds(ruleSets);
    if (duplicateIds.length > 0) {
        throw new PolicyConfigurationError(
            ErrorCode.DUPLICATE_RULE_ID,
            `Policy '${policyId}' repeats rule ids: ${duplicateIds.join(", ")}`,
            { policyId, duplicateIds },
        );
    }
}

/**
 * Holds the built-in and user-defined policies. User policies persist to
 * `<configDir>/policies.json` after every mutation.
 */
export class PolicyManager {
    private readonly policies = new Map<string, MixingPolicy>();
    private readonly ruleSets = new Map<string, PolicyRuleSet>();
    private readonly configDir: string;
    private readonly ruleEngine: PolicyRuleEngine;
    private readonly now: () => Date;

    constructor(options: PolicyManagerOptions) {
        this.configDir = options.configDir;
        this.ruleEngine = options.ruleEngine ?? policyRuleEngine;
        this.now = options.now ?? (() => new Date());

        const builtins = buildBuiltinPolicies();
        builtins.policies.forEach((policy) => this.policies.set(policy.id, policy));
        builtins.ruleSets.forEach((ruleSet) => this.ruleSets.set(ruleSet.id, ruleSet));

        this.loadUserPolicies();
    }

    get storePath(): string {
        return path.join(this.configDir, POLICY_STORE_FILENAME);
    }

    private loadUserPolicies(): void {
        if (!fs.existsSync(this.storePath)) {
            return;
        }

        try {
            const store = policyStoreDocumentSchema.parse(readJsonFile(this.storePath));
            store.policies.forEach((doc) => {
                const policy = policyFromDocument(doc);
                this.policies.set(policy.id, policy);
            });
            store.rule_sets.forEach((doc) => {
                const ruleSet = ruleSetFromDocument(doc);
                this.ruleSets.set(ruleSet.id, ruleSet);
            });
            log.info(
                `Loaded ${store.policies.length} user policies from ${this.storePath}`,
            );
        } catch (error) {
            log.warn(`Could not load user policies: ${getErrorMessage(error)}`);
        }
    }

    saveUserPolicies(): void {
        const store = {
            policies: [...this.policies.values()]
                .filter((policy) => policy.createdBy !== SYSTEM_OWNER)
                .map(policyToDocument),
            rule_sets: [...this.ruleSets.values()]
                .filter((ruleSet) => ruleSet.createdBy !== SYSTEM_OWNER)
                .map(ruleSetToDocument),
        };

        try {
            fs.mkdirSync(this.configDir, { recursive: true });
            fs.writeFileSync(this.storePath, JSON.stringify(store, null, 2));
        } catch (error) {
            throw wrapPolicyIoError(error, this.storePath);
        }
    }

    createPolicy(policy: MixingPolicy): MixingPolicy {
        if (this.policies.has(policy.id)) {
            throw new PolicyConfigurationError(
                ErrorCode.DUPLICATE_POLICY,
                `Policy '${policy.id}' already exists`,
                { policyId: policy.id },
            );
        }
        assertUniqueIds(policy.id, policy.ruleSets);

        const timestamp = this.now().toISOString();
        const created: MixingPolicy = {
            ...policy,
            createdBy: USER_OWNER,
            createdAt: policy.createdAt || timestamp,
            lastModified: timestamp,
        };
        this.policies.set(created.id, created);
        try {
            this.saveUserPolicies();
        } catch (error) {
            this.policies.delete(created.id);
            throw error;
        }
        log.info(`Created policy ${created.id}`);
        return created;
    }

    /**
     * Returns false for unknown ids. Built-in policies are not persisted, so
     * they are read-only.
     */
    updatePolicy(policyId: string, updates: MixingPolicyUpdate): boolean {
        const current = this.policies.get(policyId);
        if (!current) {
            return false;
        }
        if (current.createdBy !== USER_OWNER) {
            throw new PolicyConfigurationError(
                ErrorCode.BUILTIN_POLICY_READ_ONLY,
                `Built-in policy '${policyId}' cannot be modified`,
                { policyId },
            );
        }
        if (updates.ruleSets) {
            assertUniqueIds(policyId, updates.ruleSets);
        }

        this.policies.set(policyId, {
            ...current,
            name: updates.name ?? current.name,
            description: updates.description ?? current.description,
            version: updates.version ?? current.version,
            ruleSets: updates.ruleSets ?? current.ruleSets,
            globalWeights: updates.globalWeights ?? current.globalWeights,
            optimizationObjective:
                updates.optimizationObjective ?? current.optimizationObjective,
            fallbackStrategy: updates.fallbackStrategy ?? current.fallbackStrategy,
            strictMode: updates.strictMode ?? current.strictMode,
            adaptiveWeights: updates.adaptiveWeights ?? current.adaptiveWeights,
            usageCount: updates.usageCount ?? current.usageCount,
            tags: updates.tags ?? current.tags,
            lastModified: this.now().toISOString(),
        });
        try {
            this.saveUserPolicies();
        } catch (error) {
            this.policies.set(policyId, current);
            throw error;
        }
        return true;
    }

    /** Built-in policies cannot be deleted. */
    deletePolicy(policyId: string): boolean {
        const policy = this.policies.get(policyId);
        if (!policy || policy.createdBy !== USER_OWNER) {
            return false;
        }

        this.policies.delete(policyId);
        try {
            this.saveUserPolicies();
        } catch (error) {
            this.policies.set(policyId, policy);
            throw error;
        }
        log.info(`Deleted policy ${policyId}`);
        return true;
    }

    getPolicy(policyId: string): MixingPolicy | undefined {
        return this.policies.get(policyId);
    }

    listPolicies(): MixingPolicy[] {
        return [...this.policies.values()];
    }

    getRuleSet(ruleSetId: string): PolicyRuleSet | undefined {
        return this.ruleSets.get(ruleSetId);
    }

    listRuleSets(): PolicyRuleSet[] {
        return [...this.ruleSets.values()];
    }

    /** Scores each track against the policy, in input order. Leaves the policy untouched. */
    applyPolicy(
        policyId: string,
        tracks: Track[],
        metadataMap: TrackMetadataMap = {},
        context?: PolicyContext | null,
    ): PolicyApplicationResult[] {
        const policy = this.policies.get(policyId);
        if (!policy) {
            throw new PolicyNotFoundError(policyId);
        }

        return tracks.map((track) =>
            this.ruleEngine.applyPolicyToTrack(policy, track, metadataMap[track.id], context),
        );
    }

    exportPolicy(policyId: string, filePath: string): boolean {
        const policy = this.policies.get(policyId);
        if (!policy) {
            return false;
        }

        try {
            fs.writeFileSync(filePath, JSON.stringify(policyToDocument(policy), null, 2));
            return true;
        } catch (error) {
            logErrorWithContext(log, "Policy export failed", wrapPolicyIoError(error, filePath), {
                policyId,
            });
            return false;
        }
    }

    /** Returns the stored id, suffixed `_1`, `_2`, ... when the original id is taken. */
    importPolicy(filePath: string): string | null {
        let raw: unknown;
        try {
            raw = readJsonFile(filePath);
        } catch (error) {
            const wrapped =
                error instanceof SyntaxError
                    ? new AppError(
                          ErrorCode.POLICY_DOCUMENT_INVALID,
                          ErrorCategory.RECOVERABLE,
                          `Policy document is not valid JSON: ${filePath}`,
                          { originalError: error.message },
                      )
                    : wrapPolicyIoError(error, filePath);
            logErrorWithContext(log, "Policy import failed", wrapped);
            return null;
        }

        const parsed = mixingPolicyDocumentSchema.safeParse(raw);
        if (!parsed.success) {
            log.warn(`Rejected policy document ${filePath}`, {
                issues: parsed.error.errors.map(
                    (issue) => `${issue.path.join(".")}: ${issue.message}`,
                ),
            });
            return null;
        }

        const policy = policyFromDocument(parsed.data);
        let policyId = policy.id;
        for (let counter = 1; this.policies.has(policyId); counter++) {
            policyId = `${policy.id}_${counter}`;
        }

        this.policies.set(policyId, {
            ...policy,
            id: policyId,
            createdBy: USER_OWNER,
            createdAt: policy.createdAt || this.now().toISOString(),
        });

        try {
            this.saveUserPolicies();
        } catch (error) {
            logErrorWithContext(log, "Imported policy could not be persisted", error, {
                policyId,
            });
            this.policies.delete(policyId);
            return null;
        }

        log.info(`Imported policy ${policyId} from ${filePath}`);
        return policyId;
    }
}

export const policyManager = new PolicyManager({ configDir: config.policies.configDir });
