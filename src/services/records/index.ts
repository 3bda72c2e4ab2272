// =============================================================================
// PATHGUARD — Tickets & Feedback
//
// Records a user creates while using the assistant. Both are owned by the
// user's email and go away when the user is removed.
// =============================================================================

import { ValidationError } from '../../types/errors';
import {
  Feedback,
  FeedbackRating,
  FeedbackStore,
  Ticket,
  TicketStore,
} from '../../types/stores';

const RATING_ALIASES = new Map<string, FeedbackRating>([
  ['helpful', 'helpful'],
  ['not_helpful', 'not_helpful'],
  ['👍', 'helpful'],
  ['👎', 'not_helpful'],
]);

const MAX_TEXT_LENGTH = 20_000;

function requireText(value: unknown, field: string, options: { optional?: boolean } = {}): string {
  if (value === undefined && options.optional) return '';
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`, field);
  }
  const text = value.trim();
  if (!text && !options.optional) {
    throw new ValidationError(`${field} is required`, field);
  }
  if (text.length > MAX_TEXT_LENGTH) {
    throw new ValidationError(`${field} exceeds ${MAX_TEXT_LENGTH} characters`, field);
  }
  return text;
}

export function parseRating(value: unknown): FeedbackRating {
  const rating = typeof value === 'string' ? RATING_ALIASES.get(value.trim()) : undefined;
  if (!rating) {
    throw new ValidationError('rating must be "helpful" or "not_helpful"', 'rating');
  }
  return rating;
}

export class TicketService {
  constructor(
    private readonly store: TicketStore,
    private readonly teams: readonly string[]
  ) {}

  get availableTeams(): readonly string[] {
    return this.teams;
  }

  async create(userEmail: string, input: Record<string, unknown>): Promise<Ticket> {
    const question = requireText(input.question, 'question');
    const chatHistory = requireText(input.chatHistory, 'chatHistory', { optional: true });
    const team = input.team;

    if (typeof team !== 'string' || !this.teams.includes(team)) {
      throw new ValidationError(`team must be one of: ${this.teams.join(', ')}`, 'team');
    }

    const ticket = await this.store.create({ userEmail, question, chatHistory, team });
    console.log(`[Tickets] ${userEmail} opened ticket ${ticket.id} for ${team}`);
    return ticket;
  }

  async listRecent(limit = 50): Promise<Ticket[]> {
    return this.store.listRecent(Math.min(Math.max(limit, 1), 500));
  }
}

export class FeedbackService {
  constructor(private readonly store: FeedbackStore) {}

  async record(userEmail: string, input: Record<string, unknown>): Promise<Feedback> {
    return this.store.create({
      userEmail,
      question: requireText(input.question, 'question'),
      answer: requireText(input.answer, 'answer'),
      rating: parseRating(input.rating),
    });
  }
}
