import type { PlatformAccessory, Service } from 'homebridge';

import { asNumber } from './haystack/value.js';
import type { NumberValue, Value } from './haystack/value.js';
import type { HaystackPlatform } from './platform.js';
import type { PointDefinition } from './settings.js';

const FAHRENHEIT_UNITS = new Set(['°F', 'fahrenheit']);

// HomeKit's default CurrentTemperature range is 0-100
const TEMPERATURE_RANGE = { minValue: -100, maxValue: 150 };

/**
 * HomeKit wants Celsius. Unitless readings are taken as Celsius.
 */
export function toCelsius(reading: NumberValue): number {
  if (reading.unit !== undefined && FAHRENHEIT_UNITS.has(reading.unit)) {
    return ((reading.val - 32) * 5) / 9;
  }
  return reading.val;
}

/**
 * One Haystack point shown as a HomeKit TemperatureSensor
 */
export class PointSensorAccessory {
  private readonly service: Service;
  private readonly point: PointDefinition;

  constructor(
    private readonly platform: HaystackPlatform,
    public readonly accessory: PlatformAccessory,
  ) {
    this.point = accessory.context.point;
    const { Characteristic } = this.platform;
    const services = this.platform.Service;

    accessory
      .getService(services.AccessoryInformation)!
      .setCharacteristic(Characteristic.Manufacturer, 'Project Haystack')
      .setCharacteristic(Characteristic.Model, 'Point')
      .setCharacteristic(Characteristic.SerialNumber, this.point.id);

    this.service =
      accessory.getService(services.TemperatureSensor) ?? accessory.addService(services.TemperatureSensor);
    this.service.setCharacteristic(Characteristic.Name, this.point.name);
    this.service.getCharacteristic(Characteristic.CurrentTemperature).setProps(TEMPERATURE_RANGE);

    this.platform.log.debug(`Initialized point: ${this.point.name} (${this.point.id})`);
  }

  /**
   * Show a polled curVal. A missing or non-numeric value keeps the last reading
   * and returns false.
   */
  applyReading(curVal: Value | undefined): boolean {
    const reading = asNumber(curVal);
    if (!reading || !Number.isFinite(reading.val)) {
      this.platform.log.debug(`Point ${this.point.id} has no numeric curVal`);
      return false;
    }
    const celsius = toCelsius(reading);
    this.setFault(false);
    this.service.updateCharacteristic(this.platform.Characteristic.CurrentTemperature, celsius);
    this.platform.log.debug(`Updated ${this.point.name}: ${celsius}°C`);
    return true;
  }

  setFault(faulted: boolean): void {
    const { StatusFault } = this.platform.Characteristic;
    this.service.updateCharacteristic(StatusFault, faulted ? StatusFault.GENERAL_FAULT : StatusFault.NO_FAULT);
  }
}
