export enum ErrorCodeEnum {
  OrderNotPaid = 30400,
  BasketNotFound = 30404,
  DuplicateSettlement = 30410,
  PaymentSourceNotFound = 30414,
  RefundFailed = 30500,
  InvoiceCreationFailed = 30502,
}

export const ErrorCode = Object.freeze<Record<ErrorCodeEnum, [string, number]>>({
  [ErrorCodeEnum.OrderNotPaid]: ['Order not paid', 400],
  [ErrorCodeEnum.BasketNotFound]: ['Basket not found', 400],
  [ErrorCodeEnum.DuplicateSettlement]: ['Invoice already settled', 400],
  [ErrorCodeEnum.PaymentSourceNotFound]: ['No payment recorded for order', 400],
  [ErrorCodeEnum.RefundFailed]: ['Refund failed', 400],
  [ErrorCodeEnum.InvoiceCreationFailed]: ['Could not create payment invoice', 400],
});
