export * from './qpay.dto';
