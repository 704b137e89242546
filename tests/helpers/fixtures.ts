/**
 * Test fixtures and mock data factories.
 */

import type { Context } from 'aws-lambda';
import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import type { Instance } from '@aws-sdk/client-ec2';
import type { Instance as AsgInstance, LifecycleState } from '@aws-sdk/client-auto-scaling';
import type { Cluster } from '@shared/types';

export const testCredentials: AwsCredentialIdentityProvider = async () => ({
  accessKeyId: 'test-access-key',
  secretAccessKey: 'test-secret',
});

/**
 * Creates a cluster whose groups hold the given instance ids.
 *
 * @param groups - Instance ids per Auto Scaling Group
 * @param region - Cluster region
 */
export function createCluster(groups: string[][], region: string = 'us-east-1'): Cluster {
  return {
    name: 'test-cluster',
    region,
    autoScalingGroups: groups.map((instances, index) => ({
      name: `test-asg-${index + 1}`,
      instances,
    })),
  };
}

/**
 * Creates an EC2 instance description as returned by DescribeInstances.
 *
 * Defaults to a running instance outside any VPC.
 */
export function createInstance(
  instanceId: string,
  tagKeys: string[],
  overrides: Partial<Instance> = {}
): Instance {
  return {
    InstanceId: instanceId,
    State: { Name: 'running' },
    Tags: tagKeys.map((key) => ({ Key: key, Value: `${key}-value` })),
    ...overrides,
  };
}

/**
 * Creates an Auto Scaling Group member as returned by DescribeAutoScalingGroups.
 */
export function createAsgInstance(
  instanceId: string,
  lifecycleState: LifecycleState = 'InService'
): AsgInstance {
  return {
    InstanceId: instanceId,
    AvailabilityZone: 'us-east-1a',
    LifecycleState: lifecycleState,
    HealthStatus: 'Healthy',
    ProtectedFromScaleIn: false,
  };
}

/**
 * Creates a mock AWS Lambda Context.
 *
 * @param overrides - Optional overrides for specific context properties
 */
export function createMockContext(overrides: Partial<Context> = {}): Context {
  const defaultContext: Context = {
    callbackWaitsForEmptyEventLoop: true,
    functionName: 'tag-conformity-test',
    functionVersion: '1',
    invokedFunctionArn: 'arn:aws:lambda:us-east-1:123456789012:function:tag-conformity-test',
    memoryLimitInMB: '256',
    awsRequestId: 'test-request-id-123',
    logGroupName: '/aws/lambda/tag-conformity-test',
    logStreamName: '2026/10/19/[$LATEST]abc123',
    getRemainingTimeInMillis: () => 30000,
    done: () => {},
    fail: () => {},
    succeed: () => {},
  };

  return { ...defaultContext, ...overrides };
}
