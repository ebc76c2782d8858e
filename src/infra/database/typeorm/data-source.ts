import 'reflect-metadata';
import { AppConfigService } from '@/shared/services/config.service';
import { DataSource } from 'typeorm';
import { buildDataSourceOptions } from './typeorm.config';

// Entry point for the typeorm CLI (migration:run / migration:revert).
export default new DataSource(buildDataSourceOptions(new AppConfigService()));
