export * from './payment-processor-response.entity';
export * from './payment-source.entity';
