import { describe, it, expect } from 'vitest';
import { deriveFriendlyName } from './entity-creators.js';

describe('deriveFriendlyName', () => {
  it('should title-case the object id', () => {
    expect(deriveFriendlyName('sensor.bedroom_temperature')).toBe('Bedroom Temperature');
  });

  it('should lower-case the rest of each word', () => {
    expect(deriveFriendlyName('sensor.CO2_level')).toBe('Co2 Level');
  });

  it('should use the whole id when there is no domain', () => {
    expect(deriveFriendlyName('outdoor_humidity')).toBe('Outdoor Humidity');
  });
});
