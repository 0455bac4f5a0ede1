import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { validateEnvironment, Environment } from './config/configuration';
import { Conversation, Document, Message, MessageSubProcess } from './entities';
import { ChatModule } from './logic/chat/chat.module';
import { SocketGatewayModule } from './logic/socket-gateway/socket-gateway.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnvironment }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService<Environment, true>) => ({
        type: 'mysql',
        host: configService.get('DB_HOST', { infer: true }),
        port: configService.get('DB_PORT', { infer: true }),
        username: configService.get('DB_USERNAME', { infer: true }),
        password: configService.get('DB_PASSWORD', { infer: true }),
        database: configService.get('DB_DATABASE', { infer: true }),
        entities: [Conversation, Document, Message, MessageSubProcess],
        synchronize: configService.get('NODE_ENV', { infer: true }) !== 'production',
        logging: configService.get('NODE_ENV', { infer: true }) === 'development',
      }),
      inject: [ConfigService],
    }),
    ChatModule,
    SocketGatewayModule,
  ],
})
export class AppModule {}
