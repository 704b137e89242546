/**
 * Builds a {@link Cluster} from Auto Scaling Group names.
 */

import {
  AutoScalingClient,
  DescribeAutoScalingGroupsCommand,
} from '@aws-sdk/client-auto-scaling';
import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import type { AutoScalingGroup, Cluster } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('tag-conformity:cluster');

export interface ResolveClusterInput {
  name: string;
  region: string;
  autoScalingGroupNames: string[];
  credentials: AwsCredentialIdentityProvider;
}

/**
 * Describe the named Auto Scaling Groups and collect their instance ids.
 *
 * Groups the API does not return are logged and left out of the cluster.
 *
 * @throws Error if the Auto Scaling API call fails
 */
export async function resolveCluster(input: ResolveClusterInput): Promise<Cluster> {
  const { name, region, autoScalingGroupNames, credentials } = input;
  const autoScalingGroups: AutoScalingGroup[] = [];

  if (autoScalingGroupNames.length === 0) {
    return { name, region, autoScalingGroups };
  }

  const client = new AutoScalingClient({ region, credentials });

  let nextToken: string | undefined;
  do {
    const response = await client.send(
      new DescribeAutoScalingGroupsCommand({
        AutoScalingGroupNames: autoScalingGroupNames,
        NextToken: nextToken,
      })
    );

    for (const asg of response.AutoScalingGroups ?? []) {
      if (!asg.AutoScalingGroupName) {
        continue;
      }
      autoScalingGroups.push({
        name: asg.AutoScalingGroupName,
        instances: (asg.Instances ?? [])
          .map((i) => i.InstanceId)
          .filter((id): id is string => id !== undefined),
      });
    }

    nextToken = response.NextToken;
  } while (nextToken);

  const found = new Set(autoScalingGroups.map((asg) => asg.name));
  const missing = autoScalingGroupNames.filter((asgName) => !found.has(asgName));
  if (missing.length > 0) {
    logger.warn({ region, missing }, 'Auto Scaling Groups not found');
  }

  logger.info(
    {
      cluster: name,
      region,
      groups: autoScalingGroups.length,
      instances: autoScalingGroups.reduce((sum, asg) => sum + asg.instances.length, 0),
    },
    'Resolved cluster'
  );

  return { name, region, autoScalingGroups };
}
