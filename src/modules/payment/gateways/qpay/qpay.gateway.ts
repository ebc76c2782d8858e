import {
  GatewayAuthError,
  GatewaySettlementError,
  GatewayUnavailableError,
  RefundError,
} from '@/common/exceptions/gateway.exception';
import { isJsonObject, JsonObject } from '@/shared/utils/json.util';
import { HttpService } from '@nestjs/axios';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosRequestConfig, isAxiosError } from 'axios';
import { PaymentProvider } from '../../enums/provider.enum';
import { toMinorUnits } from '../../utils/amount.util';
import {
  AccessToken,
  CreateInvoiceInput,
  InvoiceHandle,
  PaidRow,
  PaymentGatewayInterface,
  SettlementStatus,
  StatusCheckResult,
} from '../gateway.interface';
import { QPAY_CLIENT_CONFIG, QPayClientConfig } from './qpay.config';
import {
  QPayInvoiceRequestBody,
  QPayInvoiceResponse,
  QPayPaymentCheckRequestBody,
  QPayPaymentCheckResponse,
  QPayPaymentRow,
  QPayTokenResponse,
} from './qpay.interface';

@Injectable()
export class QPayGateway implements PaymentGatewayInterface {
  readonly name = PaymentProvider.QPAY;
  readonly cardLabel = 'QPay';

  private readonly logger = new Logger(QPayGateway.name);
  private readonly PAID_STATUS = 'PAID';
  private readonly NOT_FOUND_ERROR = 'PAYMENT_NOTFOUND';
  private readonly INVOICE_RECEIVER_CODE = 'terminal';

  constructor(
    private readonly httpService: HttpService,
    @Inject(QPAY_CLIENT_CONFIG) private readonly config: QPayClientConfig,
  ) {}

  private url(path: string): string {
    return new URL(path, this.config.baseUrl).toString();
  }

  private bearer(token: AccessToken): AxiosRequestConfig {
    return {
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${token.value}`,
      },
      timeout: this.config.timeoutMs,
    };
  }

  private responseBody(error: unknown): unknown {
    return isAxiosError(error) ? error.response?.data : undefined;
  }

  buildCallbackUrl(orderReference: string): string {
    return new URL(
      `payment/qpay/check/${encodeURIComponent(orderReference)}/`,
      this.config.callbackBaseUrl,
    ).toString();
  }

  private buildInvoiceRequestBody(input: CreateInvoiceInput): QPayInvoiceRequestBody {
    return {
      invoice_code: this.config.invoiceCode,
      sender_invoice_no: input.orderReference,
      invoice_receiver_code: this.INVOICE_RECEIVER_CODE,
      invoice_description: this.config.invoiceDescription,
      amount: toMinorUnits(input.amount),
      callback_url: input.callbackUrl,
    };
  }

  private toPaidRow(row: QPayPaymentRow): PaidRow {
    const paymentId = row.payment_id;
    return {
      paymentId:
        typeof paymentId === 'string' || typeof paymentId === 'number'
          ? String(paymentId)
          : undefined,
      paymentStatus: String(row.payment_status),
      raw: row,
    };
  }

  async authenticate(): Promise<AccessToken> {
    let data: QPayTokenResponse;
    try {
      const res = await this.httpService.axiosRef.post<QPayTokenResponse>(this.url('auth/token'), undefined, {
        auth: { username: this.config.clientId, password: this.config.clientSecret },
        timeout: this.config.timeoutMs,
      });
      data = res.data;
    } catch (error) {
      const status = isAxiosError(error) ? error.response?.status : undefined;
      if (status === 401 || status === 403) {
        throw new GatewayAuthError('QPay rejected the client credentials', this.name, this.responseBody(error), {
          cause: error,
        });
      }
      this.logger.error('QPay token endpoint unreachable', error);
      throw new GatewayUnavailableError('QPay token endpoint unreachable', this.name, undefined, {
        cause: error,
      });
    }

    const token = isJsonObject(data) ? data.access_token : undefined;
    if (typeof token !== 'string' || !token) {
      throw new GatewayAuthError('QPay token response has no access_token', this.name, data);
    }

    return { value: token };
  }

  async createInvoice(input: CreateInvoiceInput): Promise<InvoiceHandle> {
    const token = await this.authenticate();
    const body = this.buildInvoiceRequestBody(input);

    let data: QPayInvoiceResponse;
    try {
      const res = await this.httpService.axiosRef.post<QPayInvoiceResponse>(
        this.url('invoice'),
        body,
        this.bearer(token),
      );
      data = res.data;
    } catch (error) {
      this.logger.error(`Error creating QPay invoice for order ${input.orderReference}`, error);
      throw new GatewaySettlementError('There was an error with QPay', this.name, this.responseBody(error), {
        cause: error,
      });
    }

    if (!isJsonObject(data) || typeof data.invoice_id !== 'string' || !data.invoice_id) {
      this.logger.error(`QPay invoice response missing invoice_id: ${JSON.stringify(data)}`);
      throw new GatewaySettlementError('QPay invoice response missing invoice_id', this.name, data);
    }

    return {
      invoiceId: data.invoice_id,
      shortLink: typeof data.qPay_shortUrl === 'string' ? data.qPay_shortUrl : '',
      qrImageRef: typeof data.qr_image === 'string' ? data.qr_image : '',
      raw: data,
    };
  }

  private async fetchPaymentPage(
    token: AccessToken,
    invoiceId: string,
    page: number,
  ): Promise<QPayPaymentCheckResponse> {
    const body: QPayPaymentCheckRequestBody = {
      object_type: 'INVOICE',
      object_id: invoiceId,
      offset: { page_number: page, page_limit: this.config.checkPageLimit },
    };

    let data: QPayPaymentCheckResponse;
    try {
      const res = await this.httpService.axiosRef.post<QPayPaymentCheckResponse>(
        this.url('payment/check'),
        body,
        this.bearer(token),
      );
      data = res.data;
    } catch (error) {
      this.logger.error(`QPay payment check failed for invoice ${invoiceId}`, error);
      throw new GatewayUnavailableError('QPay payment check failed', this.name, this.responseBody(error), {
        cause: error,
      });
    }

    if (!isJsonObject(data)) {
      throw new GatewayUnavailableError('QPay payment check returned a non-object body', this.name, data);
    }
    return data;
  }

  /**
   * Walks result pages until a PAID row shows up, the gateway runs out of
   * rows, or `checkMaxPages` is reached. One poll per call, never retried.
   * A NOT_PAID answer spanning several pages carries the first page's body
   * with the rows of every page walked.
   */
  async checkStatus(invoiceId: string): Promise<StatusCheckResult> {
    const token = await this.authenticate();
    const { checkPageLimit, checkMaxPages } = this.config;

    let first: QPayPaymentCheckResponse = {};
    const seen: QPayPaymentRow[] = [];
    let page = 1;
    for (; page <= checkMaxPages; page++) {
      const res = await this.fetchPaymentPage(token, invoiceId, page);
      if (page === 1) first = res;

      if (res.error === this.NOT_FOUND_ERROR) break;

      const rows = Array.isArray(res.rows) ? res.rows.filter((row) => isJsonObject(row)) : [];
      const paid = rows.find((row) => row.payment_status === this.PAID_STATUS);
      if (paid) {
        return { status: SettlementStatus.PAID, row: this.toPaidRow(paid), raw: res };
      }
      seen.push(...rows);

      const exhausted =
        rows.length < checkPageLimit ||
        (typeof res.count === 'number' && res.count <= page * checkPageLimit);
      if (exhausted) break;

      if (page === checkMaxPages) {
        this.logger.warn(
          `QPay payment check for invoice ${invoiceId} stopped after ${checkMaxPages} pages`,
        );
      }
    }

    const raw: JsonObject = page > 1 ? { ...first, rows: seen } : first;
    return { status: SettlementStatus.NOT_PAID, raw };
  }

  /**
   * Refunds the whole invoice. The endpoint takes no idempotency key, so a
   * repeated call may refund twice at the gateway.
   */
  async refund(invoiceId: string): Promise<JsonObject> {
    try {
      const token = await this.authenticate();
      const res = await this.httpService.axiosRef.delete(
        this.url(`payment/refund/${encodeURIComponent(invoiceId)}`),
        this.bearer(token),
      );
      const data: unknown = res.data;
      return isJsonObject(data) ? data : { body: data ?? null };
    } catch (error) {
      this.logger.error(`QPay refund failed for invoice ${invoiceId}`, error);
      throw new RefundError(`QPay refund failed for invoice ${invoiceId}`, this.name, this.responseBody(error), {
        cause: error,
      });
    }
  }
}
