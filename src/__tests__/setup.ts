import { LOG_LEVEL_ENV } from '../infrastructure/logging/Logger';

process.env[LOG_LEVEL_ENV] = 'silent';
