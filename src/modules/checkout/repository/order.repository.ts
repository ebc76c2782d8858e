import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { OrderEntity, OrderStatus } from '../entities';

export interface CreateOrderDto {
  orderNumber: string;
  basketId: string;
  total: string;
  currency: string;
}

@Injectable()
export class OrderRepository {
  constructor(
    @InjectRepository(OrderEntity)
    private readonly repo: Repository<OrderEntity>,
  ) {}

  async create(dto: CreateOrderDto, manager?: EntityManager): Promise<OrderEntity> {
    const repo = manager ? manager.getRepository(OrderEntity) : this.repo;
    return repo.save(repo.create({ ...dto, status: OrderStatus.COMPLETE }));
  }

  async findByOrderNumber(orderNumber: string): Promise<OrderEntity | null> {
    return this.repo.findOne({ where: { orderNumber } });
  }

  async updateStatus(orderNumber: string, status: OrderStatus): Promise<void> {
    await this.repo.update({ orderNumber }, { status });
  }
}
