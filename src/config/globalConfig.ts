/**
 * Global configuration shared across all instances
 * Infrastructure settings that don't vary per instance
 */

export interface GlobalConfig {
  // Market data infrastructure
  exchange: {
    baseUrl: string;      // e.g., "https://api.binance.com"
    maxKlinesPerRequest: number;
  };
}

export const globalConfig: GlobalConfig = {
  exchange: {
    baseUrl: "https://api.binance.com",
    maxKlinesPerRequest: 1000,
  },
};
