import { Injectable } from '@nestjs/common';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as dotenv from 'dotenv';
import { ISwaggerConfig } from '@/shared/interfaces/swagger-config.interface';
import { QPayClientConfig } from '@/modules/payment/gateways/qpay/qpay.config';
import {
  KafkaConfig,
  logLevel,
  Partitioners,
  ProducerConfig,
  RetryOptions,
  SASLOptions,
} from 'kafkajs';

@Injectable()
export class AppConfigService {
  constructor() {
    dotenv.config({
      path: `.env`,
    });

    // Replace \\n with \n to support multiline strings in AWS
    for (const envName of Object.keys(process.env)) {
      process.env[envName] = process.env[envName]?.replace(/\\n/g, '\n');
    }
  }

  public get(key: string): string {
    return process.env[key] || '';
  }

  public getNumber(key: string): number {
    return Number(this.get(key));
  }

  /** Base URLs are resolved against with `new URL`, which drops a last segment without a slash. */
  public getBaseUrl(key: string, fallback: string): string {
    const url = this.get(key) || fallback;
    return url.endsWith('/') ? url : `${url}/`;
  }

  get nodeEnv(): string {
    return this.get('NODE_ENV') || 'development';
  }

  get databaseConfig() {
    return {
      url: this.get('DATABASE_URL'),
      host: this.get('DATABASE_HOST') || 'localhost',
      port: this.getNumber('DATABASE_PORT') || 5432,
      name: this.get('DATABASE_NAME'),
      username: this.get('DATABASE_USERNAME'),
      password: this.get('DATABASE_PASSWORD'),
      synchronize: this.get('DATABASE_SYNCHRONIZE') === 'true',
      logging: this.get('DATABASE_LOGGING') === 'true',
      ssl: this.get('DATABASE_SSL') === 'true',
    };
  }

  getKafkaClientConfig(): KafkaConfig {
    const brokers = (this.get('KAFKA_BROKERS') || 'kafka:29092')
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);

    const retry: RetryOptions = {
      initialRetryTime: this.getNumber('KAFKA_RETRY_INITIAL_MS') || 100,
      retries: this.getNumber('KAFKA_RETRY_RETRIES') || 8,
      maxRetryTime: this.getNumber('KAFKA_RETRY_MAX_MS') || 30_000,
      factor: this.getNumber('KAFKA_RETRY_FACTOR') || 2,
    };

    const useSSL = this.get('KAFKA_SSL') === 'true';

    let sasl: SASLOptions | undefined;
    const mechanism = this.get('KAFKA_SASL_MECHANISM');
    const username = this.get('KAFKA_USERNAME');
    const password = this.get('KAFKA_PASSWORD');
    if (username && password) {
      switch (mechanism) {
        case 'scram-sha-256':
          sasl = { mechanism: 'scram-sha-256', username, password };
          break;
        case 'scram-sha-512':
          sasl = { mechanism: 'scram-sha-512', username, password };
          break;
        case 'plain':
          sasl = { mechanism: 'plain', username, password };
          break;
      }
    }

    return {
      clientId: this.get('KAFKA_CLIENT_ID') || 'qpay-checkout',
      brokers,
      ssl: useSSL || undefined,
      sasl,
      connectionTimeout: this.getNumber('KAFKA_CONNECTION_TIMEOUT_MS') || 3000,
      authenticationTimeout: this.getNumber('KAFKA_AUTH_TIMEOUT_MS') || 10_000,
      reauthenticationThreshold: this.getNumber('KAFKA_REAUTH_THRESHOLD_MS') || 60_000,
      requestTimeout: this.getNumber('KAFKA_REQUEST_TIMEOUT_MS') || 25_000,
      enforceRequestTimeout: this.get('KAFKA_ENFORCE_REQUEST_TIMEOUT') === 'true',
      retry,
      logLevel: logLevel.NOTHING,
    };
  }

  getKafkaProducerConfig(): ProducerConfig {
    const partitionerEnv = (this.get('KAFKA_PRODUCER_PARTITIONER') || 'legacy').toLowerCase();
    const createPartitioner =
      partitionerEnv === 'default'
        ? Partitioners.DefaultPartitioner
        : Partitioners.LegacyPartitioner;

    return {
      idempotent: this.get('KAFKA_PRODUCER_IDEMPOTENT') === 'true',
      maxInFlightRequests: this.getNumber('KAFKA_PRODUCER_MAX_IN_FLIGHT') || 5,
      transactionTimeout: this.getNumber('KAFKA_PRODUCER_TX_TIMEOUT_MS') || 30_000,
      allowAutoTopicCreation: this.get('KAFKA_PRODUCER_AUTO_TOPIC') === 'true',
      createPartitioner,
      retry: {
        initialRetryTime: this.getNumber('KAFKA_RETRY_INITIAL_MS') || 100,
        retries: this.getNumber('KAFKA_RETRY_RETRIES') || 8,
        maxRetryTime: this.getNumber('KAFKA_RETRY_MAX_MS') || 30_000,
        factor: this.getNumber('KAFKA_RETRY_FACTOR') || 2,
      },
    };
  }

  get swaggerConfig(): ISwaggerConfig {
    return {
      path: this.get('SWAGGER_PATH') || 'docs',
      title: this.get('SWAGGER_TITLE') || 'QPay Checkout API',
      description: this.get('SWAGGER_DESCRIPTION'),
      version: this.get('SWAGGER_VERSION') || '0.1.0',
    };
  }

  /**
   * Frozen so the gateway client cannot mutate its own credentials or base URL.
   */
  get qpayConfig(): QPayClientConfig {
    return Object.freeze({
      baseUrl: this.getBaseUrl('QPAY_BASE_URL', 'https://merchant.qpay.mn/v2/'),
      clientId: this.get('QPAY_CLIENT_ID'),
      clientSecret: this.get('QPAY_CLIENT_SECRET'),
      invoiceCode: this.get('QPAY_INVOICE_CODE'),
      invoiceDescription: this.get('QPAY_INVOICE_DESCRIPTION') || 'Course',
      // The payer lands on the storefront, which calls the check route.
      callbackBaseUrl: this.getBaseUrl('QPAY_CALLBACK_BASE_URL', this.appConfig.frontendUrl),
      timeoutMs: this.getNumber('QPAY_TIMEOUT_MS') || 15_000,
      checkPageLimit: this.getNumber('QPAY_CHECK_PAGE_LIMIT') || 100,
      checkMaxPages: this.getNumber('QPAY_CHECK_MAX_PAGES') || 5,
    });
  }

  get checkoutConfig() {
    return {
      receiptPageUrl: this.get('RECEIPT_PAGE_URL') || `${this.appConfig.frontendUrl}checkout/receipt/`,
      notPaidMessage: this.get('QPAY_NOT_PAID_MESSAGE') || 'Payment has not been completed',
    };
  }

  get winstonConfig(): winston.LoggerOptions {
    return {
      level: this.appConfig.logLevel,
      transports: [
        new DailyRotateFile({
          level: 'debug',
          filename: `./logs/${this.nodeEnv}/debug-%DATE%.log`,
          datePattern: 'YYYY-MM-DD',
          zippedArchive: true,
          maxSize: '20m',
          maxFiles: '14d',
          format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        }),
        new DailyRotateFile({
          level: 'error',
          filename: `./logs/${this.nodeEnv}/error-%DATE%.log`,
          datePattern: 'YYYY-MM-DD',
          zippedArchive: false,
          maxSize: '20m',
          maxFiles: '30d',
          format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        }),
        new winston.transports.Console({
          level: 'debug',
          handleExceptions: true,
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.timestamp({
              format: 'DD-MM-YYYY HH:mm:ss',
            }),
            winston.format.printf(({ level, message, timestamp, context, trace }) => {
              const ctx = context ? ` [${context}]` : '';
              const msgStr = typeof message === 'string' ? message : JSON.stringify(message);
              const stackStr = trace ? `\n${trace}` : '';
              return `${timestamp} ${level}:${ctx} ${msgStr}${stackStr}`;
            }),
          ),
        }),
      ],
      exitOnError: false,
    };
  }

  get appConfig() {
    const publicUrl = this.getBaseUrl('PUBLIC_URL', 'http://localhost:8080/');

    return {
      host: this.get('HOST') || '0.0.0.0',
      name: this.get('NAME') || 'qpay-checkout',
      version: this.get('VERSION'),
      port: this.getNumber('APP_PORT') || 8080,
      globalPrefix: this.get('APP_GLOBAL_PREFIX') || 'api',
      corsOrigins: this.get('CORS_ORIGINS'),
      logLevel: this.get('LOG_LEVEL') || 'debug',
      publicUrl,
      frontendUrl: this.getBaseUrl('FRONTEND_URL', publicUrl),
    };
  }
}
