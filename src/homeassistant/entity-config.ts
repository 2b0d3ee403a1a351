// src/homeassistant/entity-config.ts

import { z } from 'zod';

export const ENTITY_TYPES = ['sensor', 'number', 'button', 'switch'] as const;

export const entitySchema = z.object({
  key: z.string().regex(/^[a-z0-9_]+$/, 'key must be snake_case'),
  name: z.string().min(1),
  type: z.enum(ENTITY_TYPES),
  entityCategory: z.enum(['config', 'diagnostic']).optional(),
  deviceClass: z.string().optional(),
  icon: z.string().optional(),
  unit: z.string().optional(),
  precision: z.number().int().nonnegative().optional(),
  /** Relative to the topic prefix unless it starts with `/` */
  stateTopic: z.string().optional(),
  commandTopic: z.string().optional(),
  valueTemplate: z.string().optional(),
  min: z.number().optional(),
  max: z.number().optional(),
  step: z.string().optional(),
  mode: z.enum(['auto', 'box', 'slider']).optional(),
  payloadPress: z.string().optional(),
});

export const entityCatalogueSchema = z.array(entitySchema);

export type EntityDefinition = z.infer<typeof entitySchema>;

/** The `dev` block shared by every entity of one boiler */
export interface DeviceBlock {
  ids: string[];
  name: string;
  sw: string;
  mf: string;
  sa: string;
}

export type DiscoveryDocument = Record<string, string | number | DeviceBlock>;

export function createDeviceBlock(serial: string): DeviceBlock {
  return {
    ids: [`nbe_${serial}`],
    name: `NBE Boiler (${serial})`,
    sw: 'nbe-mqtt-bridge',
    mf: 'NBE',
    sa: '',
  };
}

function resolveTopic(topic: string, prefix: string): string {
  return topic.startsWith('/') ? topic.slice(1) : `${prefix}/${topic}`;
}

/**
 * Discovery document for one entity. Temperature numbers use the `native_*`
 * keys; switches carry `state_topic` instead of `stat_t`.
 */
export function buildEntityConfig(
  entity: EntityDefinition,
  serial: string,
  prefix: string,
  device: DeviceBlock
): DiscoveryDocument {
  const isTemperature = entity.deviceClass === 'temperature';
  const config: DiscoveryDocument = {
    name: entity.name,
    uniq_id: `nbe_${serial}_${entity.key}`,
    avty_t: `${prefix}/device/status`,
    dev: device,
  };

  if (entity.entityCategory) config.entity_category = entity.entityCategory;
  if (entity.deviceClass) config.device_class = entity.deviceClass;
  if (entity.icon) config.ic = entity.icon;
  if (entity.unit) {
    if (isTemperature) {
      config.native_unit_of_measurement = entity.unit;
      config.suggested_unit_of_measurement = entity.unit;
    } else {
      config.unit_of_measurement = entity.unit;
    }
  }
  if (entity.precision) config.suggested_display_precision = entity.precision;
  if (entity.valueTemplate) config.val_tpl = entity.valueTemplate;

  if (entity.stateTopic) {
    if (entity.type === 'switch') {
      config.state_topic = resolveTopic(entity.stateTopic, prefix);
    } else {
      config.stat_t = resolveTopic(entity.stateTopic, prefix);
    }
  }
  if (entity.commandTopic) config.cmd_t = resolveTopic(entity.commandTopic, prefix);

  if (entity.type === 'number') {
    if (entity.mode) config.mode = entity.mode;
    if (entity.min !== undefined) config[isTemperature ? 'native_min_value' : 'min'] = entity.min;
    if (entity.max !== undefined) config[isTemperature ? 'native_max_value' : 'max'] = entity.max;
    if (entity.step) config[isTemperature ? 'native_step' : 'step'] = entity.step;
  }

  if (entity.type === 'button' && entity.payloadPress) {
    config.payload_press = entity.payloadPress;
  }
  return config;
}

export function discoveryTopic(entity: EntityDefinition, serial: string): string {
  return `homeassistant/${entity.type}/nbe_${serial}/${entity.key}/config`;
}
