/**
 * AWS Lambda handler for the instance tag conformity rule.
 *
 * Entry point for the Lambda function. Loads configuration, resolves the
 * cluster, runs the rule and returns responses.
 */

import type { Context } from 'aws-lambda';
import { z } from 'zod';
import type { ConformityEvent, ConformityExecutionResult } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { resolveCluster } from './core/clusterResolver';
import { loadConfigFromSsm } from './core/config';
import { resolveCredentials } from './core/credentials';
import { createInstanceHasTagsRule } from './rules/instanceHasTags';

const logger = setupLogger('tag-conformity:main');

// Default SSM parameter name (can be overridden via environment variable)
const DEFAULT_CONFIG_PARAMETER = '/tag-conformity/config';

const DEFAULT_CLUSTER_NAME = 'default';

const EventSchema = z.object({
  autoScalingGroups: z.array(z.string().min(1)).nonempty(),
  region: z.string().min(1).optional(),
  cluster: z.string().min(1).optional(),
});

/**
 * Lambda response structure.
 */
interface LambdaResponse {
  statusCode: number;
  body: string;
}

function errorResponse(statusCode: number, error: string, requestId: string): LambdaResponse {
  return {
    statusCode,
    body: JSON.stringify({
      error,
      timestamp: new Date().toISOString(),
      request_id: requestId,
    }),
  };
}

/**
 * Lambda handler function.
 *
 * @param event - Names the Auto Scaling Groups to check and optionally the region and cluster name
 * @param context - Lambda context object
 * @returns Lambda response with statusCode and JSON body
 *
 * @example
 * Event:
 * {
 *   "autoScalingGroups": ["web-asg", "worker-asg"],
 *   "region": "us-east-1"
 * }
 *
 * Response:
 * {
 *   "statusCode": 200,
 *   "body": "{\"rule\":\"InstanceHasTag\",\"failed_count\":1,\"failed_instance_ids\":[\"i-0abc\"],...}"
 * }
 */
export async function main(event: ConformityEvent, context: Context): Promise<LambdaResponse> {
  const requestId = context.awsRequestId || 'local-test';

  logger.info(
    { requestId, functionName: context.functionName || 'tag-conformity' },
    'Lambda invoked'
  );

  const parsedEvent = EventSchema.safeParse(event);
  if (!parsedEvent.success) {
    const invalidFields = parsedEvent.error.errors.map((e) => e.path.join('.'));
    logger.warn({ invalidFields, requestId }, 'Invalid event');
    return errorResponse(400, `Invalid event fields: ${invalidFields.join(', ')}`, requestId);
  }
  const { autoScalingGroups, cluster: clusterName = DEFAULT_CLUSTER_NAME } = parsedEvent.data;

  try {
    const configParameter = process.env.CONFIG_PARAMETER_NAME ?? DEFAULT_CONFIG_PARAMETER;
    const config = await loadConfigFromSsm(configParameter);

    const region = parsedEvent.data.region ?? config.region ?? process.env.AWS_REGION;
    if (!region) {
      logger.warn({ requestId }, 'No region in event, config or environment');
      return errorResponse(400, 'No region specified', requestId);
    }

    const credentials = resolveCredentials(config.credentials);
    const rule = createInstanceHasTagsRule(config.required_tags, { credentials });

    const cluster = await resolveCluster({
      name: clusterName,
      region,
      autoScalingGroupNames: autoScalingGroups,
      credentials,
    });

    const conformity = await rule.check(cluster);

    const result: ConformityExecutionResult = {
      rule: conformity.ruleName,
      reason: rule.getNonconformingReason(),
      cluster: cluster.name,
      region,
      failed_count: conformity.failedInstanceIds.length,
      failed_instance_ids: conformity.failedInstanceIds,
      timestamp: new Date().toISOString(),
      request_id: requestId,
    };

    logger.info(
      {
        cluster: result.cluster,
        region,
        failed: result.failed_count,
        requestId,
      },
      'Lambda execution completed successfully'
    );

    return {
      statusCode: 200,
      body: JSON.stringify(result),
    };
  } catch (error) {
    logger.error(
      {
        error: String(error),
        requestId,
      },
      'Lambda execution failed'
    );

    return errorResponse(
      500,
      error instanceof Error ? error.message : String(error),
      requestId
    );
  }
}
