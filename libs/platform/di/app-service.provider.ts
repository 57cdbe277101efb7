import type { FactoryProvider, Type } from '@nestjs/common';
import type { Clock } from '../../shared/time';
import { SystemClock } from '../../shared/time';

type ProviderToken<T = unknown> = Type<T> | string | symbol;
type InjectToken = Type<unknown> | string | symbol;
type UnknownTuple = readonly unknown[];

/**
 * App services are framework-free classes; features wire them (and the ports they take) through
 * factories so the app layer never needs Nest decorators.
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

export function provideSystemClockToken(token: ProviderToken<Clock>): {
  provide: ProviderToken<Clock>;
  useValue: Clock;
} {
  return {
    provide: token,
    useValue: new SystemClock(),
  };
}
