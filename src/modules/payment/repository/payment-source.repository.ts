import { isUniqueViolation } from '@/shared/utils/db-error.util';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { PaymentSourceEntity } from '../entities';
import { PaymentProvider } from '../enums/provider.enum';

export interface CreatePaymentSourceDto {
  processorName: PaymentProvider;
  transactionId: string;
  orderNumber: string;
  basketId: string;
  amount: string;
  currency: string;
  cardLabel: string;
  rawResponse: Record<string, unknown>;
}

export class DuplicatePaymentSourceError extends Error {
  constructor(public readonly transactionId: string) {
    super(`Payment source already recorded for transaction ${transactionId}`);
    this.name = 'DuplicatePaymentSourceError';
  }
}

@Injectable()
export class PaymentSourceRepository {
  constructor(
    @InjectRepository(PaymentSourceEntity)
    private readonly repo: Repository<PaymentSourceEntity>,
  ) {}

  /**
   * Inserts the payment source. The unique index on `transactionId` turns a
   * second settlement of the same invoice into a DuplicatePaymentSourceError.
   */
  async create(dto: CreatePaymentSourceDto, manager?: EntityManager): Promise<PaymentSourceEntity> {
    const repo = manager ? manager.getRepository(PaymentSourceEntity) : this.repo;
    try {
      return await repo.save(repo.create(dto));
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicatePaymentSourceError(dto.transactionId);
      }
      throw error;
    }
  }

  async findByOrderNumber(orderNumber: string): Promise<PaymentSourceEntity | null> {
    return this.repo.findOne({ where: { orderNumber } });
  }
}
