import { systemClock, type Clock } from '@/app/lib/utils/dates';

export const DEFAULT_GENERAL_FUND_TITLE = 'General Donation';

export interface ServiceOptions {
  clock?: Clock;
  /** Title of the system project that receives donations with no other destination */
  generalFundTitle?: string;
}

export type ResolvedServiceOptions = Required<ServiceOptions>;

export function resolveServiceOptions(options: ServiceOptions = {}): ResolvedServiceOptions {
  return {
    clock: options.clock ?? systemClock,
    generalFundTitle: options.generalFundTitle ?? DEFAULT_GENERAL_FUND_TITLE,
  };
}
