import type {
  API,
  Characteristic,
  DynamicPlatformPlugin,
  Logging,
  PlatformAccessory,
  PlatformConfig,
  Service,
} from 'homebridge';

import { PointSensorAccessory } from './pointSensorAccessory.js';
import {
  PLATFORM_NAME,
  PLUGIN_NAME,
  DEFAULT_FILTER,
  DEFAULT_POLLING_INTERVAL,
  MIN_POLLING_INTERVAL,
} from './settings.js';
import type { PointDefinition } from './settings.js';
import { HaystackClient } from './api/client.js';
import { AuthError, AuthExpiredError, HaystackError } from './errors.js';
import type { WireFormat } from './haystack/codec.js';
import { asRef, asStr } from './haystack/value.js';
import type { Grid, Tags } from './haystack/value.js';

/**
 * Plugin configuration, read from the untyped PlatformConfig
 */
export interface HaystackPointsConfig {
  url?: string;
  username?: string;
  password?: string;
  filter: string;
  pollingInterval: number;
  format?: WireFormat;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function readPlatformConfig(config: PlatformConfig): HaystackPointsConfig {
  const format = config.format === 'zinc' || config.format === 'hayson' ? config.format : undefined;
  const interval = typeof config.pollingInterval === 'number' ? config.pollingInterval : DEFAULT_POLLING_INTERVAL;
  return {
    url: optionalString(config.url),
    username: optionalString(config.username),
    password: optionalString(config.password),
    filter: optionalString(config.filter) ?? DEFAULT_FILTER,
    pollingInterval: Math.max(interval, MIN_POLLING_INTERVAL),
    format,
  };
}

function pointName(row: Tags, id: string): string {
  return asStr(row.dis) ?? asStr(row.navName) ?? asRef(row.id)?.dis ?? id;
}

/**
 * Haystack Points Platform
 * Exposes the temperature points matching a Haystack filter as HomeKit sensors
 */
export class HaystackPlatform implements DynamicPlatformPlugin {
  public readonly Service: typeof Service;
  public readonly Characteristic: typeof Characteristic;

  // Cached accessories from disk
  private readonly accessories: Map<string, PlatformAccessory> = new Map();

  // Active accessory handlers, keyed by point id
  private readonly sensorAccessories: Map<string, PointSensorAccessory> = new Map();

  private client?: HaystackClient;
  private settings?: HaystackPointsConfig;

  private pollingTimer?: NodeJS.Timeout;

  // Track all registered UUIDs for cleanup
  private registeredUUIDs: string[] = [];

  constructor(
    public readonly log: Logging,
    public readonly config: PlatformConfig,
    public readonly api: API,
  ) {
    this.Service = api.hap.Service;
    this.Characteristic = api.hap.Characteristic;

    this.log.debug('Initializing Haystack points platform');

    // Wait for Homebridge to finish loading cached accessories
    this.api.on('didFinishLaunching', () => {
      this.log.debug('didFinishLaunching callback');
      this.setupPlatform().catch((error: unknown) => {
        this.log.error('Unexpected error during setup:', error);
      });
    });

    this.api.on('shutdown', () => {
      clearInterval(this.pollingTimer);
    });
  }

  /**
   * Called by Homebridge to restore cached accessories
   */
  configureAccessory(accessory: PlatformAccessory): void {
    this.log.info('Restoring cached accessory:', accessory.displayName);
    this.accessories.set(accessory.UUID, accessory);
  }

  /**
   * Main setup after Homebridge is ready
   */
  async setupPlatform(): Promise<void> {
    const settings = readPlatformConfig(this.config);

    if (!settings.url) {
      this.log.error('Missing required config: url. Please set the project API URL, e.g. http://host/api/demo');
      return;
    }
    if (!settings.username) {
      this.log.error('Missing required config: username. Please configure your Haystack username in the plugin settings.');
      return;
    }
    if (!settings.password) {
      this.log.error('Missing required config: password. Please configure your Haystack password in the plugin settings.');
      return;
    }
    this.settings = settings;

    let points: Grid;
    try {
      this.client = await HaystackClient.open(
        {
          url: settings.url,
          username: settings.username,
          password: settings.password,
          format: settings.format,
        },
        this.log,
      );
      points = await this.client.read(settings.filter);
    } catch (error) {
      this.reportError(error);
      return;
    }

    this.discoverPoints(points);
    this.cleanupObsoleteAccessories();
    this.applyReadings(points);

    this.startPolling(settings.pollingInterval);
  }

  /**
   * Register one sensor accessory per record with an id
   */
  private discoverPoints(points: Grid): void {
    for (const row of points.rows) {
      const id = asRef(row.id)?.id;
      if (id === undefined) {
        continue;
      }
      const definition: PointDefinition = { id, name: pointName(row, id) };

      const uuid = this.api.hap.uuid.generate(`${this.settings?.url}-${id}`);
      this.registeredUUIDs.push(uuid);

      let accessory = this.accessories.get(uuid);

      if (accessory) {
        this.log.info('Restoring point from cache:', definition.name);
        accessory.context.point = definition;
      } else {
        this.log.info('Adding new point:', definition.name);
        accessory = new this.api.platformAccessory(definition.name, uuid);
        accessory.context.point = definition;
        this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
      }

      this.sensorAccessories.set(id, new PointSensorAccessory(this, accessory));
    }
  }

  /**
   * Remove any cached accessories that no longer match the filter
   */
  private cleanupObsoleteAccessories(): void {
    for (const [uuid, accessory] of this.accessories) {
      if (!this.registeredUUIDs.includes(uuid)) {
        this.log.info('Removing obsolete accessory:', accessory.displayName);
        this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
      }
    }
  }

  private startPolling(intervalSeconds: number): void {
    this.log.info(`Starting API polling every ${intervalSeconds} seconds`);

    this.pollingTimer = setInterval(() => {
      this.pollApi().catch((error: unknown) => {
        this.log.error('Unexpected error during API poll:', error);
      });
    }, intervalSeconds * 1000);
  }

  /**
   * Read the filter again and update accessories
   */
  async pollApi(): Promise<void> {
    if (!this.client || !this.settings) {
      return;
    }

    try {
      this.applyReadings(await this.client.read(this.settings.filter));
    } catch (error) {
      this.reportError(error);
      for (const handler of this.sensorAccessories.values()) {
        handler.setFault(true);
      }
    }
  }

  private applyReadings(points: Grid): void {
    const seen = new Set<string>();
    for (const row of points.rows) {
      const id = asRef(row.id)?.id;
      const handler = id === undefined ? undefined : this.sensorAccessories.get(id);
      if (id === undefined || !handler) {
        continue;
      }
      seen.add(id);
      handler.applyReading(row.curVal);
    }

    for (const id of this.sensorAccessories.keys()) {
      if (!seen.has(id)) {
        this.log.warn(`No reading found for point: ${id}`);
      }
    }
  }

  private reportError(error: unknown): void {
    if (error instanceof AuthError || error instanceof AuthExpiredError) {
      this.log.error(`Authentication failed - check your username and password: ${error.message}`);
    } else if (error instanceof HaystackError) {
      this.log.error(`Haystack error: ${error.message}`);
    } else {
      this.log.error('Unexpected error:', error);
    }
  }
}
