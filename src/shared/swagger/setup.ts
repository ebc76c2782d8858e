import { INestApplication } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { SwaggerTheme, SwaggerThemeNameEnum } from 'swagger-themes';
import { ISwaggerConfig } from '@/shared/interfaces/swagger-config.interface';

export function setupSwagger(app: INestApplication, config: ISwaggerConfig) {
  const options = new DocumentBuilder()
    .setTitle(config.title)
    .setDescription(config.description || 'Checkout endpoints backed by the QPay gateway')
    .setVersion(config.version)
    .addTag('qpay')
    .build();
  const document = SwaggerModule.createDocument(app, options);
  const theme = new SwaggerTheme();

  const mountPath = (config.path || 'docs').replace(/^\/+|\/+$|\s+/g, '');
  SwaggerModule.setup(mountPath, app, document, {
    useGlobalPrefix: true,
    customCss: theme.getBuffer(SwaggerThemeNameEnum.ONE_DARK),
  });
}
