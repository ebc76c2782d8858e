export const QPAY_CLIENT_CONFIG = Symbol('QPAY_CLIENT_CONFIG');

export interface QPayClientConfig {
  readonly baseUrl: string;
  readonly clientId: string;
  readonly clientSecret: string;
  readonly invoiceCode: string;
  readonly invoiceDescription: string;
  readonly callbackBaseUrl: string;
  readonly timeoutMs: number;
  readonly checkPageLimit: number;
  readonly checkMaxPages: number;
}
