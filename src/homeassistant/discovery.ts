// src/homeassistant/discovery.ts

import { ConfigError } from '../errors.js';
import { rootLogger } from '../logger.js';
import catalogue from './entities.json' with { type: 'json' };
import {
  buildEntityConfig,
  createDeviceBlock,
  discoveryTopic,
  entityCatalogueSchema,
  type EntityDefinition,
} from './entity-config.js';

const logger = rootLogger.createLogger('HomeAssistant');

/** Where discovery documents are sent */
export interface DiscoveryPublisher {
  publishJson(topic: string, document: unknown): Promise<void>;
}

/**
 * Validates the bundled entity catalogue.
 */
export function loadEntityCatalogue(data: unknown = catalogue): EntityDefinition[] {
  const result = entityCatalogueSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue';
    throw new ConfigError(`Invalid entity catalogue (${where})`);
  }
  return result.data;
}

/**
 * Waits for `ready`, then publishes one discovery document per entity.
 * Returns how many were published.
 */
export async function publishDiscovery(
  publisher: DiscoveryPublisher,
  serial: string,
  prefix: string,
  ready?: Promise<void>,
  entities: EntityDefinition[] = loadEntityCatalogue()
): Promise<number> {
  if (ready) {
    logger.debug('Waiting for initial data before publishing discovery', { serial });
    await ready;
  }

  const device = createDeviceBlock(serial);
  let published = 0;
  for (const entity of entities) {
    const topic = discoveryTopic(entity, serial);
    try {
      await publisher.publishJson(topic, buildEntityConfig(entity, serial, prefix, device));
      published++;
      logger.debug(`Published discovery for ${entity.name} at ${topic}`);
    } catch (err: unknown) {
      logger.error(`Failed to publish discovery for ${entity.name} (${entity.key})`, err);
    }
  }

  logger.info(`Published ${published} entity discovery messages`, { serial });
  return published;
}
