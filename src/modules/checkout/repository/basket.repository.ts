import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, Repository } from 'typeorm';
import { BasketAttributeEntity, BasketEntity, BasketStatus } from '../entities';

@Injectable()
export class BasketRepository {
  constructor(
    @InjectRepository(BasketEntity)
    private readonly baskets: Repository<BasketEntity>,
    @InjectRepository(BasketAttributeEntity)
    private readonly attributes: Repository<BasketAttributeEntity>,
  ) {}

  async findById(id: string): Promise<BasketEntity | null> {
    return this.baskets.findOne({ where: { id } });
  }

  /**
   * Every basket carrying `name = value`. More than one result means the
   * correlation key is ambiguous; callers must treat that as an error.
   */
  async findByAttribute(name: string, value: string): Promise<BasketEntity[]> {
    const rows = await this.attributes.find({ where: { name, valueText: value } });
    if (rows.length === 0) return [];

    return this.baskets.find({ where: { id: In(rows.map((row) => row.basketId)) } });
  }

  async setAttribute(basketId: string, name: string, value: string): Promise<void> {
    await this.attributes.upsert({ basketId, name, valueText: value }, ['basketId', 'name']);
  }

  async updateStatus(id: string, status: BasketStatus, manager?: EntityManager): Promise<void> {
    const repo = manager ? manager.getRepository(BasketEntity) : this.baskets;
    await repo.update({ id }, { status });
  }
}
