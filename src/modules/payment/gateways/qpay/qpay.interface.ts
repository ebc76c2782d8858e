// Wire shapes of the QPay merchant API (v2)

export interface QPayTokenResponse {
  token_type?: string;
  expires_in?: number;
  access_token?: string;
  refresh_token?: string;
}

export interface QPayInvoiceRequestBody {
  invoice_code: string;
  sender_invoice_no: string;
  invoice_receiver_code: 'terminal';
  invoice_description: string;
  amount: string;
  callback_url: string;
}

export interface QPayInvoiceResponse {
  invoice_id?: string;
  qPay_shortUrl?: string;
  qr_image?: string;
  qr_text?: string;
  [key: string]: unknown;
}

export interface QPayPaymentCheckRequestBody {
  object_type: 'INVOICE';
  object_id: string;
  offset: {
    page_number: number;
    page_limit: number;
  };
}

export interface QPayPaymentRow {
  payment_id?: string | number;
  payment_status?: string;
  payment_date?: string;
  payment_amount?: number | string;
  payment_currency?: string;
  payment_wallet?: string;
  transaction_type?: string;
  [key: string]: unknown;
}

export interface QPayPaymentCheckResponse {
  count?: number;
  paid_amount?: number;
  rows?: QPayPaymentRow[];
  error?: string;
  [key: string]: unknown;
}
