import type { FactoryProvider, Type } from '@nestjs/common';
import type { Clock } from '../../shared/time';
import { SystemClock } from '../../shared/time';

type ProviderToken<T = unknown> = Type<T> | string | symbol;
type InjectToken = Type<unknown> | string | symbol;
type UnknownTuple = readonly unknown[];

/**
 * Application services are plain classes with no Nest decorators; modules build them
 * through factories so the app layer stays framework-free.
 */
export function provideAppService<T, TDeps extends UnknownTuple>(params: {
  provide: ProviderToken<T>;
  inject: ReadonlyArray<InjectToken>;
  factory: (...deps: TDeps) => T | Promise<T>;
}): FactoryProvider<T> {
  return {
    provide: params.provide,
    inject: [...params.inject],
    useFactory: (...deps: TDeps) => params.factory(...deps),
  };
}

/** Same as `provideAppService`, appending a `SystemClock` after the injected deps. */
export function provideClockedAppService<T, TDeps extends UnknownTuple>(params: {
  provide: ProviderToken<T>;
  inject: ReadonlyArray<InjectToken>;
  factory: (...deps: [...TDeps, Clock]) => T | Promise<T>;
}): FactoryProvider<T> {
  return provideAppService({
    provide: params.provide,
    inject: params.inject,
    factory: (...deps: TDeps) => params.factory(...deps, new SystemClock()),
  });
}
