/**
 * This is the name of the platform that users will use to register the plugin in the Homebridge config.json
 */
export const PLATFORM_NAME = 'HaystackPoints';

/**
 * This must match the name of your plugin as defined the package.json `name` property
 */
export const PLUGIN_NAME = 'homebridge-haystack-points';

/**
 * Default polling interval in seconds
 */
export const DEFAULT_POLLING_INTERVAL = 60;

/**
 * Minimum allowed polling interval in seconds
 */
export const MIN_POLLING_INTERVAL = 30;

/**
 * Filter used when the config does not name one
 */
export const DEFAULT_FILTER = 'point and temp and sensor';

/**
 * What each sensor accessory remembers in its context
 */
export interface PointDefinition {
  id: string;
  name: string;
}
