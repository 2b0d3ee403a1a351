// src/mqtt/commands.ts

import { STATUS_OK } from '../constants/constants.js';
import { rootLogger } from '../logger.js';
import { describePayload } from '../payload/payload.js';
import type { MqttMessageHandler, SettingWriter } from '../types/nbe-types.js';

const logger = rootLogger.createLogger('Commands');

/** Relative filter the bridge subscribes to for writes */
export const SET_TOPIC_FILTER = 'set/+/+';

export const POWER_SWITCH_KEY = 'device.power_switch';

export interface SettingCommand {
  key: string;
  value: string;
}

/**
 * `<prefix>/set/<category>/<name>` becomes `<category>.<name>`; null when
 * the topic has fewer than two levels.
 */
export function parseSetTopic(topic: string): string | null {
  const levels = topic.split('/');
  if (levels.length < 2) return null;
  return `${levels[levels.length - 2]}.${levels[levels.length - 1]}`;
}

/**
 * The power switch has no register of its own: ON or 1 starts the boiler,
 * anything else stops it.
 */
export function translatePowerCommand(key: string, value: string): SettingCommand {
  if (key !== POWER_SWITCH_KEY) return { key, value };
  if (value === 'ON' || value === '1') return { key: 'misc.start', value: '1' };
  return { key: 'misc.stop', value: '1' };
}

/**
 * Handler for the set topics: every message becomes one authenticated write.
 * Failures are logged, never thrown back into the MQTT client.
 */
export function createSetCommandHandler(writer: SettingWriter): MqttMessageHandler {
  return (topic, payload) => {
    const key = parseSetTopic(topic);
    if (key === null) {
      logger.warn(`Ignoring command on ${topic}`);
      return;
    }
    const command = translatePowerCommand(key, payload);

    writer
      .setAsync(command.key, command.value, response => {
        const context = { seqNo: response.seqNo, function: response.function };
        if (response.status === STATUS_OK) {
          logger.info(`Set ${command.key} to ${command.value}`, context);
          return;
        }
        const reason = describePayload(response.payload);
        logger.warn(
          `Set ${command.key} rejected with status ${response.status}: ${reason}`,
          context
        );
      })
      .catch((err: unknown) => {
        logger.error(`Failed to set ${command.key} to ${command.value}`, err);
      });
  };
}
