// src/monitor/boiler-monitor.ts

import {
  ADVANCED_DATA_CATEGORY,
  DATA_POLL_INTERVAL,
  NbeFunction,
  OPERATING_DATA_CATEGORY,
  SETTINGS_POLL_INTERVAL,
  SETTING_CATEGORIES,
} from '../constants/constants.js';
import { rootLogger } from '../logger.js';
import PollingManager from '../polling-manager.js';
import type {
  BoilerMonitorOptions,
  ChangeSetPublisher,
  PollingSystemStats,
  RegisterReader,
} from '../types/nbe-types.js';
import { CategoryMonitor } from './category-monitor.js';

const logger = rootLogger.createLogger('BoilerMonitor');

/**
 * Every category of one boiler on a shared PollingManager: the setting
 * groups, operating data and advanced data.
 */
export class BoilerMonitor {
  public readonly settings: CategoryMonitor[];
  public readonly operatingData: CategoryMonitor;
  public readonly advancedData: CategoryMonitor;
  private readonly polling: PollingManager;

  constructor(
    reader: RegisterReader,
    publish: ChangeSetPublisher,
    options: BoilerMonitorOptions = {},
    polling: PollingManager = new PollingManager()
  ) {
    const settingsInterval = options.settingsInterval ?? SETTINGS_POLL_INTERVAL;
    const dataInterval = options.dataInterval ?? DATA_POLL_INTERVAL;
    this.polling = polling;

    this.settings = (options.categories ?? SETTING_CATEGORIES).map(
      category =>
        new CategoryMonitor(reader, publish, {
          category,
          function: NbeFunction.GET_SETUP,
          path: `${category}.*`,
          interval: settingsInterval,
        })
    );
    this.operatingData = new CategoryMonitor(reader, publish, {
      category: OPERATING_DATA_CATEGORY,
      function: NbeFunction.GET_OPERATING_DATA,
      path: '*',
      interval: dataInterval,
      deriveState: true,
    });
    this.advancedData = new CategoryMonitor(reader, publish, {
      category: ADVANCED_DATA_CATEGORY,
      function: NbeFunction.GET_ADVANCED_DATA,
      path: '*',
      interval: dataInterval,
    });
  }

  get monitors(): CategoryMonitor[] {
    return [...this.settings, this.operatingData, this.advancedData];
  }

  start(): void {
    for (const monitor of this.monitors) {
      if (this.polling.hasTask(monitor.category)) {
        this.polling.startTask(monitor.category);
      } else {
        this.polling.addTask(monitor.toTask());
      }
    }
    logger.info(`Polling ${this.monitors.length} categories`);
  }

  stop(): void {
    for (const monitor of this.monitors) {
      if (this.polling.hasTask(monitor.category)) {
        this.polling.stopTask(monitor.category);
      }
    }
    logger.info('Polling stopped');
  }

  /**
   * Resolves once every setting group and the operating data have published
   * their first data.
   */
  async whenReady(): Promise<void> {
    await Promise.all([...this.settings, this.operatingData].map(monitor => monitor.ready.promise));
  }

  getStats(): PollingSystemStats {
    return this.polling.getSystemStats();
  }
}
