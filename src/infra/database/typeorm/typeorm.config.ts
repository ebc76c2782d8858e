import { BasketAttributeEntity, BasketEntity, OrderEntity } from '@/modules/checkout/entities';
import {
  PaymentProcessorResponseEntity,
  PaymentSourceEntity,
} from '@/modules/payment/entities';
import { AppConfigService } from '@/shared/services/config.service';
import { DataSourceOptions } from 'typeorm';
import { InitialCheckoutSchema1729300000000 } from './migrations/1729300000000-InitialCheckoutSchema';

export const ENTITIES = [
  BasketEntity,
  BasketAttributeEntity,
  OrderEntity,
  PaymentProcessorResponseEntity,
  PaymentSourceEntity,
];

export const buildDataSourceOptions = (configService: AppConfigService): DataSourceOptions => {
  const db = configService.databaseConfig;
  const connection = db.url
    ? { url: db.url }
    : {
        host: db.host,
        port: db.port,
        database: db.name,
        username: db.username,
        password: db.password,
      };

  return {
    type: 'postgres',
    ...connection,
    entities: ENTITIES,
    migrations: [InitialCheckoutSchema1729300000000],
    synchronize: db.synchronize,
    logging: db.logging,
    ssl: db.ssl ? { rejectUnauthorized: false } : false,
  };
};
