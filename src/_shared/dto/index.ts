/**
 * Configuration DTOs, validated with class-validator
 */

export * from './server-config.dto';
