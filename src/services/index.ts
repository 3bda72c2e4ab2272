// =============================================================================
// PATHGUARD — Service Assembly
// =============================================================================

import { AppDeps } from '../types/system';
import { AdminService } from './admin';
import { AuditService } from './audit';
import { FeedbackService, TicketService } from './records';

export interface AppServices extends AppDeps {
  audit: AuditService;
  admin: AdminService;
  tickets: TicketService;
  feedback: FeedbackService;
}

export function createServices(deps: AppDeps): AppServices {
  const { stores, vocabulary, settings } = deps;
  const audit = new AuditService(stores.audit);

  return {
    ...deps,
    audit,
    admin: new AdminService({
      profiles: stores.profiles,
      cascades: [stores.tickets, stores.feedback],
      vocabulary,
      audit,
    }),
    tickets: new TicketService(stores.tickets, settings.ticketTeams),
    feedback: new FeedbackService(stores.feedback),
  };
}
