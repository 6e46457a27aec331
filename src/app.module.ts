import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AuthModule } from './auth/auth.module';
import { CommonModule } from './common/common.module';
import { authConfig } from './config/auth.config';
import { storeConfig } from './config/store.config';
import { DatabaseModule } from './database/database.module';
import { IdentityModule } from './identity/identity.module';
import { TenantsModule } from './tenants/tenants.module';
import { UsersModule } from './users/users.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [authConfig, storeConfig],
    }),
    CommonModule,
    DatabaseModule,
    IdentityModule,
    AuthModule, // Login, refresh, registration
    UsersModule,
    TenantsModule,
  ],
})
export class AppModule {}
