import { JsonObject } from '@/shared/utils/json.util';
import { PaymentProvider } from '../enums/provider.enum';

export interface AccessToken {
  value: string;
}

export interface CreateInvoiceInput {
  orderReference: string;
  /** Decimal amount in major units, e.g. "49.99". */
  amount: string;
  currency: string;
  callbackUrl: string;
}

export interface InvoiceHandle {
  invoiceId: string;
  shortLink: string;
  qrImageRef: string;
  raw: JsonObject;
}

export enum SettlementStatus {
  NOT_PAID = 'NOT_PAID',
  PAID = 'PAID',
}

export interface PaidRow {
  paymentId?: string;
  paymentStatus: string;
  raw: JsonObject;
}

export type StatusCheckResult =
  | { status: SettlementStatus.PAID; row: PaidRow; raw: JsonObject }
  | { status: SettlementStatus.NOT_PAID; raw: JsonObject };

export interface PaymentGatewayInterface {
  readonly name: PaymentProvider;
  /** Label stored on payment sources settled through this gateway. */
  readonly cardLabel: string;

  authenticate(): Promise<AccessToken>;
  buildCallbackUrl(orderReference: string): string;
  createInvoice(input: CreateInvoiceInput): Promise<InvoiceHandle>;
  checkStatus(invoiceId: string): Promise<StatusCheckResult>;
  refund(invoiceId: string): Promise<JsonObject>;
}
