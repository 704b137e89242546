/**
 * Default diagnostic sink: writes rule events to the structured log.
 */

import type { Logger } from 'pino';
import type { RuleEvent, RuleEventSink } from '@shared/types';

export function createLoggingSink(logger: Logger): RuleEventSink {
  return (event: RuleEvent) => {
    switch (event.type) {
      case 'instance-skipped':
        if (event.reason === 'in-vpc') {
          logger.info(event, `Instance ${event.instanceId} is in VPC and is ignored`);
        } else {
          logger.info(
            event,
            `Instance ${event.instanceId} is not running, state is ${event.state}`
          );
        }
        break;
      case 'instance-nonconforming':
        logger.info(event, `Instance ${event.instanceId} does not have all tags`);
        break;
    }
  };
}
