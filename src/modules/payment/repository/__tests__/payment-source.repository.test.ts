import { getRepositoryToken } from '@nestjs/typeorm';
import { Test } from '@nestjs/testing';
import { QueryFailedError } from 'typeorm';
import { PaymentSourceEntity } from '../../entities';
import { PaymentProvider } from '../../enums/provider.enum';
import {
  CreatePaymentSourceDto,
  DuplicatePaymentSourceError,
  PaymentSourceRepository,
} from '../payment-source.repository';

describe('PaymentSourceRepository', () => {
  let repository: PaymentSourceRepository;
  const repo = {
    create: jest.fn((dto: CreatePaymentSourceDto) => dto),
    save: jest.fn(),
    findOne: jest.fn(),
  };

  const dto: CreatePaymentSourceDto = {
    processorName: PaymentProvider.QPAY,
    transactionId: 'INV-1',
    orderNumber: 'ORD-1',
    basketId: 'basket-1',
    amount: '49.99',
    currency: 'USD',
    cardLabel: 'QPay',
    rawResponse: { payment_status: 'PAID' },
  };

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        PaymentSourceRepository,
        { provide: getRepositoryToken(PaymentSourceEntity), useValue: repo },
      ],
    }).compile();

    repository = moduleRef.get(PaymentSourceRepository);
  });

  it('should save the payment source', async () => {
    repo.save.mockResolvedValue({ id: 'source-1', ...dto });

    await expect(repository.create(dto)).resolves.toMatchObject({ id: 'source-1', transactionId: 'INV-1' });
    expect(repo.save).toHaveBeenCalledWith(dto);
  });

  it('should map a unique violation to DuplicatePaymentSourceError', async () => {
    const driverError = Object.assign(new Error('duplicate key value'), { code: '23505' });
    repo.save.mockRejectedValue(new QueryFailedError('INSERT INTO "payment_sources"', [], driverError));

    const error = await repository.create(dto).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DuplicatePaymentSourceError);
    expect(error).toMatchObject({ transactionId: 'INV-1' });
  });

  it('should rethrow other database errors', async () => {
    const driverError = Object.assign(new Error('null value'), { code: '23502' });
    const failure = new QueryFailedError('INSERT INTO "payment_sources"', [], driverError);
    repo.save.mockRejectedValue(failure);

    await expect(repository.create(dto)).rejects.toBe(failure);
  });
});
