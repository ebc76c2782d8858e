import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { PaymentProcessorResponseEntity } from '../entities';

export interface CreateProcessorResponseDto {
  processorName: string;
  transactionId: string | null;
  basketId: string | null;
  response: Record<string, unknown>;
}

/**
 * Audit rows are written outside any checkout transaction so a rolled back
 * order still leaves the gateway response behind.
 */
@Injectable()
export class PaymentProcessorResponseRepository {
  constructor(
    @InjectRepository(PaymentProcessorResponseEntity)
    private readonly repo: Repository<PaymentProcessorResponseEntity>,
  ) {}

  async create(dto: CreateProcessorResponseDto): Promise<PaymentProcessorResponseEntity> {
    return this.repo.save(this.repo.create(dto));
  }
}
