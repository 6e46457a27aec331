import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { AuthConfig, authConfig } from '../config/auth.config';
import { StoreConfig, storeConfig } from '../config/store.config';
import { DatabaseService } from '../database/database.service';
import { IdentityModule } from '../identity/identity.module';

// Controllers
import { AuthController } from './auth.controller';

// Services
import { AuthService } from './auth.service';
import { AuthorizationService } from './services/authorization.service';
import { JwtTokenService, buildJwtOptions } from './services/jwt.service';
import { PasswordService } from './services/password.service';
import { SessionService } from './services/session.service';

// Revocation records
import { InMemoryRevocationStore } from './revocation/memory-revocation.store';
import { PgRevocationStore } from './revocation/pg-revocation.store';
import { RevocationStore } from './revocation/revocation.store';

@Module({
  imports: [
    IdentityModule,

    // JWT configuration
    JwtModule.registerAsync({
      inject: [authConfig.KEY],
      useFactory: (config: AuthConfig) => buildJwtOptions(config),
    }),
  ],

  controllers: [AuthController],

  providers: [
    AuthService,
    AuthorizationService,
    PasswordService,
    JwtTokenService,
    SessionService,
    {
      provide: RevocationStore,
      inject: [storeConfig.KEY, DatabaseService],
      useFactory: (config: StoreConfig, db: DatabaseService): RevocationStore =>
        config.driver === 'postgres' ? new PgRevocationStore(db) : new InMemoryRevocationStore(),
    },
  ],

  exports: [AuthService, AuthorizationService, SessionService, IdentityModule],
})
export class AuthModule {}
