// src/monitor/category-monitor.ts

import { IDLE_STATE, POWER_STATES } from '../constants/constants.js';
import { NbeProtocolError } from '../errors.js';
import { rootLogger } from '../logger.js';
import { textValue } from '../payload/register-value.js';
import type {
  CategoryMonitorOptions,
  ChangeSet,
  ChangeSetPublisher,
  PollingTaskOptions,
  RegisterReader,
  RegisterValue,
  ResponseFrame,
} from '../types/nbe-types.js';
import { ReadySignal } from './ready-signal.js';
import { RegisterCache } from './register-cache.js';

const logger = rootLogger.createLogger('Monitor');

/**
 * Inserts `state_text` and `state_on` right after an integer `state` entry.
 */
export function deriveStateRegisters(changes: ChangeSet): ChangeSet {
  const state = changes.get('state');
  if (state?.kind !== 'integer') return changes;

  const result: ChangeSet = new Map();
  for (const [key, value] of changes) {
    result.set(key, value);
    if (key === 'state') {
      result.set('state_text', textValue(POWER_STATES[state.value] ?? 'Unknown'));
      result.set('state_on', textValue(state.value === IDLE_STATE ? 'OFF' : 'ON'));
    }
  }
  return result;
}

/**
 * Polls one register category and publishes what changed since the last poll.
 */
export class CategoryMonitor {
  public readonly category: string;
  public readonly ready: ReadySignal = new ReadySignal();
  private readonly reader: RegisterReader;
  private readonly publish: ChangeSetPublisher;
  private readonly options: Required<CategoryMonitorOptions>;
  private readonly cache: RegisterCache = new RegisterCache();

  constructor(
    reader: RegisterReader,
    publish: ChangeSetPublisher,
    options: CategoryMonitorOptions
  ) {
    this.reader = reader;
    this.publish = publish;
    this.options = { deriveState: false, ...options };
    this.category = options.category;
  }

  async poll(): Promise<ChangeSet> {
    const response = await this.reader.get(this.options.function, this.options.path);
    return this.handleResponse(response);
  }

  /**
   * Diffs a response against the cache and hands the change set, possibly
   * empty, to the publisher.
   */
  handleResponse(response: ResponseFrame): ChangeSet {
    if (response.payload.kind === 'error') {
      throw new NbeProtocolError(response.payload.error);
    }

    const received = response.payload.values;
    const cached = this.cache.apply(received);
    const changes = this.options.deriveState ? deriveStateRegisters(cached) : cached;

    logger.trace(`${changes.size} of ${received.size} registers changed`, {
      category: this.category,
      seqNo: response.seqNo,
    });
    this.publish(this.category, changes);

    if (received.size > 0 && this.ready.fire()) {
      logger.debug('First data published', { category: this.category });
    }
    return changes;
  }

  /** Last value seen for a register */
  lastValue(key: string): RegisterValue | undefined {
    return this.cache.get(key);
  }

  toTask(): PollingTaskOptions<ChangeSet> {
    return {
      id: this.category,
      name: this.options.path,
      interval: this.options.interval,
      fn: () => this.poll(),
    };
  }
}
