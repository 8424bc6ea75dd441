import { beforeEach, describe, expect, it } from 'vitest';

import { NA, num, str } from './haystack/value.js';
import type { Value } from './haystack/value.js';
import type { HaystackPlatform } from './platform.js';
import { PointSensorAccessory, toCelsius } from './pointSensorAccessory.js';
import {
  MockCharacteristicConstants,
  characteristicValue,
  createMockAccessory,
  createMockCharacteristicTypes,
  createMockLogger,
  createMockServiceTypes,
} from './test/mocks.js';

interface MockPlatform {
  log: ReturnType<typeof createMockLogger>;
  Service: ReturnType<typeof createMockServiceTypes>;
  Characteristic: ReturnType<typeof createMockCharacteristicTypes>;
}

// Create a mock platform that matches the real platform's interface
function createMockPlatform(): MockPlatform {
  return {
    log: createMockLogger(),
    Service: createMockServiceTypes(),
    Characteristic: createMockCharacteristicTypes(),
  };
}

describe('toCelsius', () => {
  it('should convert Fahrenheit readings', () => {
    expect(toCelsius(num(68, '°F'))).toBe(20);
    expect(toCelsius(num(212, 'fahrenheit'))).toBe(100);
  });

  it('should pass Celsius and unitless readings through', () => {
    expect(toCelsius(num(21.5, '°C'))).toBe(21.5);
    expect(toCelsius(num(18))).toBe(18);
  });
});

describe('PointSensorAccessory', () => {
  let mockPlatform: MockPlatform;
  let mockAccessory: ReturnType<typeof createMockAccessory>;
  let sensor: PointSensorAccessory;

  beforeEach(() => {
    mockPlatform = createMockPlatform();
    mockAccessory = createMockAccessory('Zone Temp', 'p:demo:r:zone1');
    sensor = new PointSensorAccessory(mockPlatform as unknown as HaystackPlatform, mockAccessory);
  });

  describe('constructor', () => {
    it('should initialize with accessory information', () => {
      const infoService = mockAccessory.getService('AccessoryInformation');
      expect(infoService?.setCharacteristic).toHaveBeenCalledWith('Manufacturer', 'Project Haystack');
      expect(infoService?.setCharacteristic).toHaveBeenCalledWith('Model', 'Point');
      expect(infoService?.setCharacteristic).toHaveBeenCalledWith('SerialNumber', 'p:demo:r:zone1');
    });

    it('should add a temperature sensor service named after the point', () => {
      const service = mockAccessory.getService('TemperatureSensor');

      expect(mockAccessory.addService).toHaveBeenCalledWith(mockPlatform.Service.TemperatureSensor);
      expect(characteristicValue(service, 'Name')).toBe('Zone Temp');
      expect(service?.getCharacteristic('CurrentTemperature')?.setProps).toHaveBeenCalledWith({
        minValue: -100,
        maxValue: 150,
      });
    });
  });

  describe('applyReading', () => {
    it('should show the reading in Celsius and clear the fault', () => {
      const service = mockAccessory.getService('TemperatureSensor');

      expect(sensor.applyReading(num(77, '°F'))).toBe(true);

      expect(characteristicValue(service, 'CurrentTemperature')).toBe(25);
      expect(service?.updateCharacteristic).toHaveBeenCalledWith(
        MockCharacteristicConstants.StatusFault,
        MockCharacteristicConstants.StatusFault.NO_FAULT,
      );
      expect(mockPlatform.log.debug).toHaveBeenCalledWith('Updated Zone Temp: 25°C');
    });

    it.each<[string, Value | undefined]>([
      ['NA', NA],
      ['a string', str('72')],
      ['nothing', undefined],
      ['NaN', num(Number.NaN)],
    ])('should keep the last reading when curVal is %s', (_label, curVal) => {
      sensor.applyReading(num(21.5));

      expect(sensor.applyReading(curVal)).toBe(false);

      expect(characteristicValue(mockAccessory.getService('TemperatureSensor'), 'CurrentTemperature')).toBe(21.5);
      expect(mockPlatform.log.debug).toHaveBeenCalledWith('Point p:demo:r:zone1 has no numeric curVal');
    });
  });

  describe('setFault', () => {
    it('should set and clear the fault status', () => {
      const service = mockAccessory.getService('TemperatureSensor');

      sensor.setFault(true);
      expect(service?.updateCharacteristic).toHaveBeenLastCalledWith(
        MockCharacteristicConstants.StatusFault,
        MockCharacteristicConstants.StatusFault.GENERAL_FAULT,
      );

      sensor.setFault(false);
      expect(service?.updateCharacteristic).toHaveBeenLastCalledWith(
        MockCharacteristicConstants.StatusFault,
        MockCharacteristicConstants.StatusFault.NO_FAULT,
      );
    });
  });
});
