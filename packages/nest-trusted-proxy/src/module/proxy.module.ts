import {
  DynamicModule,
  Global,
  MiddlewareConsumer,
  Module,
  NestModule,
  OnModuleDestroy,
  OnModuleInit,
  RequestMethod,
} from '@nestjs/common';
import { createTrustedProxyMiddleware } from '../http/proxy.middleware';
import { TrustedProxyModuleOptions } from './options';
import { TRUSTED_PROXY_OPTIONS } from './proxy.tokens';
import { clearTrustedProxyRuntime, setTrustedProxyRuntime } from './runtime.registry';
import { TrustedProxyRuntime } from './runtime';

@Global()
@Module({})
/** Global Nest module that creates a shared `TrustedProxyRuntime` and applies the middleware to every route. */
export class TrustedProxyModule implements NestModule, OnModuleInit, OnModuleDestroy {
  constructor(private readonly runtime: TrustedProxyRuntime) {}

  static forRoot(options: TrustedProxyModuleOptions = {}): DynamicModule {
    return {
      module: TrustedProxyModule,
      providers: [
        {
          provide: TRUSTED_PROXY_OPTIONS,
          useValue: options,
        },
        {
          provide: TrustedProxyRuntime,
          useFactory: (input: TrustedProxyModuleOptions) => new TrustedProxyRuntime(input),
          inject: [TRUSTED_PROXY_OPTIONS],
        },
      ],
      exports: [TrustedProxyRuntime],
      global: true,
    };
  }

  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(createTrustedProxyMiddleware(this.runtime)).forRoutes({ path: '*', method: RequestMethod.ALL });
  }

  /** Exposes the runtime through the registry for middleware and decorators created outside DI. */
  onModuleInit(): void {
    setTrustedProxyRuntime(this.runtime);
  }

  onModuleDestroy(): void {
    clearTrustedProxyRuntime();
  }
}
