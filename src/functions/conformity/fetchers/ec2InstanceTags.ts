/**
 * EC2-backed tag fetcher.
 *
 * Describes the requested instances and keeps the tag keys of the eligible ones:
 * running instances on the flat (EC2-Classic) network. Instances inside a VPC
 * surface tags differently and are skipped, as are instances in any other state.
 */

import {
  EC2Client,
  DescribeInstancesCommand,
  InstanceStateName,
  type Instance,
} from '@aws-sdk/client-ec2';
import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import type { FetchInstanceTags, InstanceTagSnapshot, RuleEventSink } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { createLoggingSink } from '../core/events';

const logger = setupLogger('tag-conformity:ec2-tags');

export interface Ec2InstanceTagFetcherOptions {
  credentials: AwsCredentialIdentityProvider;
  onEvent?: RuleEventSink;
}

/**
 * Create the default fetch step.
 *
 * Transport errors from EC2 are not caught; retry policy belongs to the caller.
 */
export function createEc2InstanceTagFetcher(
  options: Ec2InstanceTagFetcherOptions
): FetchInstanceTags {
  const onEvent = options.onEvent ?? createLoggingSink(logger);

  return async (region, instanceIds) => {
    const snapshot: InstanceTagSnapshot = new Map();
    if (!instanceIds || instanceIds.length === 0) {
      return snapshot;
    }

    const requested = new Set(instanceIds);
    const client = new EC2Client({ region, credentials: options.credentials });

    logger.debug({ region, count: requested.size }, 'Describing instances');

    let nextToken: string | undefined;
    do {
      const response = await client.send(
        new DescribeInstancesCommand({
          InstanceIds: [...requested],
          NextToken: nextToken,
        })
      );

      for (const reservation of response.Reservations ?? []) {
        for (const instance of reservation.Instances ?? []) {
          const instanceId = instance.InstanceId;
          if (instanceId && requested.has(instanceId) && isEligible(instanceId, instance, onEvent)) {
            snapshot.set(instanceId, tagKeysOf(instance));
          }
        }
      }

      nextToken = response.NextToken;
    } while (nextToken);

    logger.debug({ region, eligible: snapshot.size }, 'Fetched instance tags');
    return snapshot;
  };
}

function isEligible(instanceId: string, instance: Instance, onEvent: RuleEventSink): boolean {
  if (instance.VpcId) {
    onEvent({ type: 'instance-skipped', instanceId, reason: 'in-vpc', vpcId: instance.VpcId });
    return false;
  }

  const state = instance.State?.Name;
  if (state !== InstanceStateName.running) {
    onEvent({
      type: 'instance-skipped',
      instanceId,
      reason: 'not-running',
      state: state ?? 'unknown',
    });
    return false;
  }

  return true;
}

function tagKeysOf(instance: Instance): Set<string> {
  return new Set(
    (instance.Tags ?? []).map((tag) => tag.Key).filter((key): key is string => key !== undefined)
  );
}
