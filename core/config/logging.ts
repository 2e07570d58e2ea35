import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  colors: config.npm.colors,

  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    registry: {
      level: 'error'
    },
    pass: {
      level: 'error'
    },
    alias: {
      level: 'error'
    },
    loader: {
      level: 'error'
    },
    frontend: {
      level: 'error'
    },
    config: {
      level: 'warn'
    },
    cli: {
      level: 'error'
    }
  }
} as const;

export type ServiceName = keyof typeof loggingConfig.services;
