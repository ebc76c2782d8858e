import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PaymentModule } from '../payment/payment.module';
import { QPayCheckoutController } from './controllers/http/qpay-checkout.controller';
import { BasketAttributeEntity, BasketEntity, OrderEntity } from './entities';
import { BasketRepository } from './repository/basket.repository';
import { OrderRepository } from './repository/order.repository';
import { CheckoutService } from './services/checkout.service';

@Module({
  imports: [
    PaymentModule,
    TypeOrmModule.forFeature([BasketEntity, BasketAttributeEntity, OrderEntity]),
  ],
  controllers: [QPayCheckoutController],
  providers: [CheckoutService, BasketRepository, OrderRepository],
})
export class CheckoutModule {}
