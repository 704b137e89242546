/**
 * Unit tests for core/clusterResolver.ts
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import {
  AutoScalingClient,
  DescribeAutoScalingGroupsCommand,
} from '@aws-sdk/client-auto-scaling';
import { resolveCluster } from '@functions/conformity/core/clusterResolver';
import { createAsgInstance, testCredentials } from '../../../../helpers/fixtures';

const autoScalingMock = mockClient(AutoScalingClient);

describe('resolveCluster', () => {
  beforeEach(() => {
    autoScalingMock.reset();
  });

  it('should collect instance ids per Auto Scaling Group', async () => {
    autoScalingMock.on(DescribeAutoScalingGroupsCommand).resolves({
      AutoScalingGroups: [
        {
          AutoScalingGroupName: 'web-asg',
          MinSize: 1,
          MaxSize: 3,
          DesiredCapacity: 2,
          DefaultCooldown: 300,
          AvailabilityZones: ['us-east-1a'],
          HealthCheckType: 'EC2',
          CreatedTime: new Date('2026-01-01T00:00:00Z'),
          Instances: [
            createAsgInstance('i-1'),
            createAsgInstance('i-2', 'Pending'),
          ],
        },
      ],
    });

    const cluster = await resolveCluster({
      name: 'web',
      region: 'us-east-1',
      autoScalingGroupNames: ['web-asg'],
      credentials: testCredentials,
    });

    expect(cluster).toEqual({
      name: 'web',
      region: 'us-east-1',
      autoScalingGroups: [{ name: 'web-asg', instances: ['i-1', 'i-2'] }],
    });
    expect(
      autoScalingMock.commandCalls(DescribeAutoScalingGroupsCommand)[0].args[0].input
    ).toMatchObject({ AutoScalingGroupNames: ['web-asg'] });
  });

  it('should follow NextToken and omit groups that were not found', async () => {
    autoScalingMock
      .on(DescribeAutoScalingGroupsCommand)
      .resolvesOnce({
        AutoScalingGroups: [
          {
            AutoScalingGroupName: 'a-asg',
            MinSize: 0,
            MaxSize: 1,
            DesiredCapacity: 1,
            DefaultCooldown: 300,
            AvailabilityZones: ['us-east-1a'],
            HealthCheckType: 'EC2',
            CreatedTime: new Date('2026-01-01T00:00:00Z'),
            Instances: [createAsgInstance('i-a')],
          },
        ],
        NextToken: 'next',
      })
      .resolvesOnce({
        AutoScalingGroups: [
          {
            AutoScalingGroupName: 'b-asg',
            MinSize: 0,
            MaxSize: 1,
            DesiredCapacity: 0,
            DefaultCooldown: 300,
            AvailabilityZones: ['us-east-1b'],
            HealthCheckType: 'EC2',
            CreatedTime: new Date('2026-01-01T00:00:00Z'),
          },
        ],
      });

    const cluster = await resolveCluster({
      name: 'mixed',
      region: 'us-east-1',
      autoScalingGroupNames: ['a-asg', 'b-asg', 'missing-asg'],
      credentials: testCredentials,
    });

    expect(cluster.autoScalingGroups).toEqual([
      { name: 'a-asg', instances: ['i-a'] },
      { name: 'b-asg', instances: [] },
    ]);
    expect(autoScalingMock.commandCalls(DescribeAutoScalingGroupsCommand)).toHaveLength(2);
  });

  it('should not call the API for an empty name list', async () => {
    const cluster = await resolveCluster({
      name: 'empty',
      region: 'us-east-1',
      autoScalingGroupNames: [],
      credentials: testCredentials,
    });

    expect(cluster.autoScalingGroups).toEqual([]);
    expect(autoScalingMock.calls()).toHaveLength(0);
  });

  it('should propagate API errors', async () => {
    autoScalingMock.on(DescribeAutoScalingGroupsCommand).rejects(new Error('Unauthorized'));

    await expect(
      resolveCluster({
        name: 'web',
        region: 'us-east-1',
        autoScalingGroupNames: ['web-asg'],
        credentials: testCredentials,
      })
    ).rejects.toThrow('Unauthorized');
  });
});
