/**
 * Core type definitions for the instance tag conformity rule.
 *
 * Centralizes shared types to avoid circular dependencies.
 */

import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';

/**
 * A named group of instance identifiers managed as a unit.
 */
export interface AutoScalingGroup {
  name: string;
  instances: string[];
}

/**
 * A region-scoped collection of Auto Scaling Groups under evaluation.
 */
export interface Cluster {
  name: string;
  region: string;
  autoScalingGroups: AutoScalingGroup[];
}

/**
 * Outcome of one conformity check.
 *
 * `failedInstanceIds` carries no ordering guarantee; compare it as a set.
 */
export interface Conformity {
  ruleName: string;
  failedInstanceIds: string[];
}

/**
 * Surface the compliance-scanning framework calls.
 */
export interface ConformityRule {
  check(cluster: Cluster): Promise<Conformity>;
  getName(): string;
  getNonconformingReason(): string;
}

/**
 * Immutable configuration of one rule instance.
 */
export interface RuleConfig {
  /**
   * Trimmed, non-empty, unique tag keys in first-seen order.
   */
  readonly requiredTags: readonly string[];
  readonly credentials: AwsCredentialIdentityProvider;
}

/**
 * Tag keys of every eligible instance, keyed by instance id.
 * Lives for the duration of a single check.
 */
export type InstanceTagSnapshot = Map<string, ReadonlySet<string>>;

/**
 * Fetch step: returns tag keys for the eligible instances among `instanceIds`.
 */
export type FetchInstanceTags = (
  region: string,
  instanceIds: readonly string[] | null | undefined
) => Promise<InstanceTagSnapshot>;

/**
 * Predicate step: true when an instance with these tag keys conforms.
 */
export type TagPredicate = (tagKeys: ReadonlySet<string>) => boolean;

/**
 * Diagnostic records emitted while a rule runs.
 */
export type RuleEvent =
  | {
      type: 'instance-skipped';
      instanceId: string;
      reason: 'in-vpc';
      vpcId: string;
    }
  | {
      type: 'instance-skipped';
      instanceId: string;
      reason: 'not-running';
      state: string;
    }
  | {
      type: 'instance-nonconforming';
      instanceId: string;
      missingTags: string[];
    };

export type RuleEventSink = (event: RuleEvent) => void;

/**
 * Rule settings stored as YAML in SSM Parameter Store.
 */
export interface Config {
  version?: string;
  required_tags: string[];
  /**
   * Fallback region when the invocation event names none.
   */
  region?: string;
  credentials?: CredentialSettings;
  [key: string]: unknown;
}

export interface CredentialSettings {
  /**
   * SSO profile to use instead of the default provider chain.
   */
  profile?: string;
}

/**
 * Lambda event structure.
 */
export interface ConformityEvent {
  autoScalingGroups?: unknown;
  region?: unknown;
  cluster?: unknown;
  [key: string]: unknown;
}

/**
 * Lambda execution result.
 */
export interface ConformityExecutionResult {
  rule: string;
  reason: string;
  cluster: string;
  region: string;
  failed_count: number;
  failed_instance_ids: string[];
  timestamp: string;
  request_id: string;
}
