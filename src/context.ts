// =============================================================================
// PUBLISHING DESK — Application Context
//
// Collaborators shared by middleware, routes and services. Built once in
// server.ts (or by a test) and passed to createApp().
// =============================================================================

import { AppConfig } from './config';
import { PermissionEvaluator } from './authorization/evaluator';
import { Logger } from './observability/logger';
import { Store } from './types/store';

export interface AppContext {
  config: AppConfig;
  store: Store;
  evaluator: PermissionEvaluator;
  logger: Logger;
}
