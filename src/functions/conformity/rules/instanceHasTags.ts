/**
 * Conformity rule that checks whether all instances of a cluster carry a set of tags.
 */

import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import type {
  Cluster,
  Conformity,
  ConformityRule,
  FetchInstanceTags,
  RuleConfig,
  RuleEventSink,
  TagPredicate,
} from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { createLoggingSink } from '../core/events';
import { createRuleConfig } from '../core/ruleConfig';
import { createEc2InstanceTagFetcher } from '../fetchers/ec2InstanceTags';

export const RULE_NAME = 'InstanceHasTag';

const logger = setupLogger('tag-conformity:instance-has-tags');

/**
 * Replaceable steps of the rule.
 *
 * A custom `fetchTags` must return only eligible instances; `predicate` only
 * ever sees what the fetch step returned.
 */
export interface InstanceHasTagsOptions {
  fetchTags?: FetchInstanceTags;
  predicate?: TagPredicate;
  onEvent?: RuleEventSink;
}

/**
 * Default predicate: the instance carries every required tag key.
 */
export function hasAllTags(requiredTags: readonly string[]): TagPredicate {
  return (tagKeys) => requiredTags.every((tag) => tagKeys.has(tag));
}

export class InstanceHasTagsRule implements ConformityRule {
  private readonly reason: string;
  private readonly fetchTags: FetchInstanceTags;
  private readonly predicate: TagPredicate;
  private readonly onEvent: RuleEventSink;

  constructor(
    private readonly config: RuleConfig,
    options: InstanceHasTagsOptions = {}
  ) {
    this.onEvent = options.onEvent ?? createLoggingSink(logger);
    this.fetchTags =
      options.fetchTags ??
      createEc2InstanceTagFetcher({ credentials: config.credentials, onEvent: this.onEvent });
    this.predicate = options.predicate ?? hasAllTags(config.requiredTags);
    this.reason = `Instances do not have tags (${[...config.requiredTags].sort().join(',')})`;
  }

  /**
   * Evaluate every instance of the cluster.
   *
   * Instances the fetch step drops (stopped, in a VPC) are neither passed nor
   * failed. Errors from the fetch step propagate and no result is produced.
   */
  async check(cluster: Cluster): Promise<Conformity> {
    const instanceIds = cluster.autoScalingGroups.flatMap((asg) => asg.instances);
    const failedInstanceIds: string[] = [];

    if (instanceIds.length > 0) {
      const snapshot = await this.fetchTags(cluster.region, instanceIds);

      for (const [instanceId, tagKeys] of snapshot) {
        if (!this.predicate(tagKeys)) {
          this.onEvent({
            type: 'instance-nonconforming',
            instanceId,
            missingTags: this.config.requiredTags.filter((tag) => !tagKeys.has(tag)),
          });
          failedInstanceIds.push(instanceId);
        }
      }
    }

    return { ruleName: this.getName(), failedInstanceIds };
  }

  getName(): string {
    return RULE_NAME;
  }

  getNonconformingReason(): string {
    return this.reason;
  }
}

/**
 * Build a rule from raw tag names, validating them first.
 *
 * @throws {ConfigValidationError} If the list or any of its elements is missing or blank
 */
export function createInstanceHasTagsRule(
  requiredTags: ReadonlyArray<string | null | undefined> | null | undefined,
  options: InstanceHasTagsOptions & { credentials?: AwsCredentialIdentityProvider } = {}
): InstanceHasTagsRule {
  const { credentials, ...steps } = options;
  return new InstanceHasTagsRule(createRuleConfig(requiredTags, credentials), steps);
}
