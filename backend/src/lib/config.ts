// Environment configuration
export const config = {
  // AWS Region
  region: process.env.AWS_REGION || 'us-east-1',

  // Logging
  logLevel: process.env.LOG_LEVEL || 'info',

  // Settings source: SSM parameter when named, local JSON file otherwise
  settings: {
    paramName: process.env.SETTINGS_PARAM_NAME || '',
    path: process.env.SETTINGS_PATH || 'config/settings.json',
  },

  // Data provider queries
  providers: {
    timeoutMs: Number(process.env.PROVIDER_TIMEOUT_MS) || 30_000,
  },

  // Feature flags
  features: {
    strictProviderSelection: process.env.STRICT_PROVIDER_SELECTION === 'true',
  },

  // App version (set during build)
  version: process.env.APP_VERSION || '0.1.0',
} as const;
