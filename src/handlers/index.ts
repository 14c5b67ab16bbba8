import { JobHandlers } from '../services/dispatcher';
import { createAccountHandlers } from './accountHandlers';
import { createCommunityHandlers } from './communityHandlers';
import { createLiveHandlers } from './liveHandlers';
import { createPaymentHandlers } from './paymentHandlers';
import { HandlerDeps } from './context';

export type { HandlerDeps } from './context';

export function createJobHandlers(deps: HandlerDeps): JobHandlers {
  return {
    ...createAccountHandlers(deps),
    ...createLiveHandlers(deps),
    ...createPaymentHandlers(deps),
    ...createCommunityHandlers(deps)
  };
}
