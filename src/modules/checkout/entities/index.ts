export * from './basket.entity';
export * from './basket-attribute.entity';
export * from './order.entity';
