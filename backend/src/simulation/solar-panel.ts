import { Power } from "@gridtwin/domain";

const SUNRISE_HOUR = 6;
const SUNSET_HOUR = 18;
const DAYLIGHT_HOURS = SUNSET_HOUR - SUNRISE_HOUR;

/** Half-sine daylight profile peaking at solar noon, attenuated by cloud cover. */
export class SolarPanel {
  constructor(private readonly peakCapacityKw: number) {
  }

  generate(hourOfDay: number, cloudCoverage = 0): Power {
    if (hourOfDay < SUNRISE_HOUR || hourOfDay >= SUNSET_HOUR) {
      return Power.zero();
    }
    const sunAngle = Math.PI * (hourOfDay - SUNRISE_HOUR) / DAYLIGHT_HOURS;
    const clearSky = this.peakCapacityKw * Math.sin(sunAngle);
    return Power.fromKilowatts(clearSky * (1 - cloudCoverage));
  }
}
