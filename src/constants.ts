import _ from 'lodash';

/**
 * All Application Constants for the Solar Maintenance Monitor
 */
export class Constants {
  /**
   * Solar Panel Configuration
   */
  public static SOLAR_PANEL = {
    get RATED_WATTAGE(): number {
      return _.toNumber(process.env.SOLAR_PANEL_RATED_WATTAGE) || 300; // W at 1000 W/m²
    }
  };

  /**
   * Maintenance Rule Configuration
   */
  public static MAINTENANCE = {
    get DEGRADATION_THRESHOLD(): number {
      return _.toNumber(process.env.PANEL_DEGRADATION_THRESHOLD) || 0.05; // 5% performance drop
    },

    get TEMPERATURE_THRESHOLD(): number {
      return _.toNumber(process.env.TEMPERATURE_ALERT_THRESHOLD) || 70; // °C
    },

    get TEMPERATURE_SEVERITY_SPAN(): number {
      return _.toNumber(process.env.TEMPERATURE_SEVERITY_SPAN) || 10; // °C above threshold for full severity
    },

    get MIN_EFFICIENCY_SAMPLES(): number {
      return _.toNumber(process.env.MIN_EFFICIENCY_SAMPLES) || 30;
    },

    get ROLLING_WINDOW_DAYS(): number {
      return _.toNumber(process.env.EFFICIENCY_WINDOW_DAYS) || 30;
    },

    get ALERT_RETENTION_DAYS(): number {
      return _.toNumber(process.env.ALERT_RETENTION_DAYS) || 7;
    }
  };

  /**
   * Environmental Impact Configuration
   */
  public static IMPACT = {
    get CO2_KG_PER_KWH(): number {
      return _.toNumber(process.env.CO2_KG_PER_KWH) || 0.4;
    },

    get TREES_PER_KWH(): number {
      return _.toNumber(process.env.TREES_PER_KWH) || 0.01;
    },

    get GRID_DISPLACEMENT_RATIO(): number {
      return _.toNumber(process.env.GRID_DISPLACEMENT_RATIO) || 0.9;
    },

    /**
     * Every reading is counted as this many hours of production
     */
    get READING_INTERVAL_HOURS(): number {
      return _.toNumber(process.env.READING_INTERVAL_HOURS) || 1;
    }
  };

  /**
   * Telemetry Input Configuration
   */
  public static INPUT = {
    get SOURCE(): 'prompt' | 'file' {
      return process.env.READING_SOURCE === 'file' ? 'file' : 'prompt';
    },

    get FILE(): string {
      return process.env.READING_FILE || '';
    },

    get READING_COUNT(): number | undefined {
      const raw = process.env.READING_COUNT;
      if (!raw) {
        return undefined;
      }
      const count = _.toNumber(raw);
      return _.isInteger(count) && count >= 0 ? count : undefined;
    }
  };

  /**
   * Report Output Configuration
   */
  public static REPORT = {
    get HTML_FILE(): string {
      return process.env.REPORT_HTML_FILE || 'environmental_impact.html';
    }
  };

  /**
   * Logging Configuration
   */
  public static LOGGING = {
    get LOG_DIR(): string {
      return process.env.LOG_DIR || 'logs';
    },

    get APP_NAME(): string {
      return process.env.APP_NAME || 'solar-monitor';
    },

    get LOG_LEVEL(): string {
      return process.env.LOG_LEVEL?.toUpperCase() || 'INFO';
    }
  };

  /**
   * Database Configuration
   */
  public static DATABASE = {
    get TYPE(): string {
      return process.env.DATABASE_TYPE || 'memory';
    },

    get MONGODB_URI(): string {
      return process.env.MONGODB_URI || 'mongodb://localhost:27017/solar-monitor';
    },

    get COUCHDB_URL(): string {
      return process.env.COUCHDB_URL || 'http://localhost:5984';
    }
  };
}
