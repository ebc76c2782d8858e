export enum PaymentProvider {
  QPAY = 'qpay',
}
