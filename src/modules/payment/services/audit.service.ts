import { LoggerService } from '@/shared/services/logger.service';
import { JsonObject } from '@/shared/utils/json.util';
import { Injectable } from '@nestjs/common';
import { PaymentProcessorResponseRepository } from '../repository/payment-processor-response.repository';

@Injectable()
export class AuditService {
  constructor(
    private readonly repo: PaymentProcessorResponseRepository,
    private readonly logger: LoggerService,
  ) {
    logger.setContext(AuditService.name);
  }

  /**
   * Persist one gateway response. Never throws: a failed write is logged so
   * the outcome of the gateway call itself is what reaches the caller.
   */
  async record(
    processorName: string,
    response: JsonObject,
    transactionId: string | null,
    basketId?: string | null,
  ): Promise<void> {
    try {
      await this.repo.create({
        processorName,
        transactionId,
        basketId: basketId ?? null,
        response,
      });
    } catch (error) {
      this.logger.error(
        `Failed to record ${processorName} response for transaction [${transactionId}]`,
        error,
      );
    }
  }
}
