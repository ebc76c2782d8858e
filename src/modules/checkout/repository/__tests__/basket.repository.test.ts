import { createBasket } from '@/__tests__/utils/mock-helpers';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Test } from '@nestjs/testing';
import { In } from 'typeorm';
import { BasketAttributeEntity, BasketEntity, BasketStatus } from '../../entities';
import { BasketRepository } from '../basket.repository';

describe('BasketRepository', () => {
  let repository: BasketRepository;
  const baskets = { findOne: jest.fn(), find: jest.fn(), update: jest.fn() };
  const attributes = { find: jest.fn(), upsert: jest.fn() };

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        BasketRepository,
        { provide: getRepositoryToken(BasketEntity), useValue: baskets },
        { provide: getRepositoryToken(BasketAttributeEntity), useValue: attributes },
      ],
    }).compile();

    repository = moduleRef.get(BasketRepository);
  });

  describe('findByAttribute', () => {
    it('should load every basket carrying the attribute value', async () => {
      const basket = createBasket();
      attributes.find.mockResolvedValue([{ basketId: basket.id, name: 'payment_intent_id', valueText: 'INV-1' }]);
      baskets.find.mockResolvedValue([basket]);

      await expect(repository.findByAttribute('payment_intent_id', 'INV-1')).resolves.toEqual([basket]);
      expect(attributes.find).toHaveBeenCalledWith({
        where: { name: 'payment_intent_id', valueText: 'INV-1' },
      });
      expect(baskets.find).toHaveBeenCalledWith({ where: { id: In([basket.id]) } });
    });

    it('should skip the basket query when nothing matches', async () => {
      attributes.find.mockResolvedValue([]);

      await expect(repository.findByAttribute('payment_intent_id', 'INV-1')).resolves.toEqual([]);
      expect(baskets.find).not.toHaveBeenCalled();
    });
  });

  it('should upsert attributes on basket and name', async () => {
    await repository.setAttribute('basket-1', 'payment_intent_id', 'INV-2');

    expect(attributes.upsert).toHaveBeenCalledWith(
      { basketId: 'basket-1', name: 'payment_intent_id', valueText: 'INV-2' },
      ['basketId', 'name'],
    );
  });

  it('should update the status', async () => {
    await repository.updateStatus('basket-1', BasketStatus.SUBMITTED);

    expect(baskets.update).toHaveBeenCalledWith({ id: 'basket-1' }, { status: BasketStatus.SUBMITTED });
  });
});
