// =============================================================================
// PATHGUARD — PostgreSQL Ticket & Feedback Stores
// =============================================================================

import { Pool } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import {
  Feedback,
  FeedbackRating,
  FeedbackStore,
  NewFeedback,
  NewTicket,
  Ticket,
  TicketStatus,
  TicketStore,
} from '../../types/stores';

interface TicketRow {
  id: string;
  user_email: string;
  question: string;
  chat_history: string;
  team: string;
  status: TicketStatus;
  created_at: Date;
}

interface FeedbackRow {
  id: string;
  user_email: string;
  question: string;
  answer: string;
  rating: FeedbackRating;
  created_at: Date;
}

function toTicket(row: TicketRow): Ticket {
  return {
    id: row.id,
    userEmail: row.user_email,
    question: row.question,
    chatHistory: row.chat_history,
    team: row.team,
    status: row.status,
    createdAt: row.created_at,
  };
}

export class PgTicketStore implements TicketStore {
  readonly recordType = 'ticket';

  constructor(private readonly pool: Pool) {}

  async create(ticket: NewTicket): Promise<Ticket> {
    const result = await this.pool.query<TicketRow>(
      `INSERT INTO tickets (id, user_email, question, chat_history, team)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING id, user_email, question, chat_history, team, status, created_at`,
      [uuidv4(), ticket.userEmail, ticket.question, ticket.chatHistory, ticket.team]
    );
    return toTicket(result.rows[0]);
  }

  async listRecent(limit: number): Promise<Ticket[]> {
    const result = await this.pool.query<TicketRow>(
      `SELECT id, user_email, question, chat_history, team, status, created_at
       FROM tickets
       ORDER BY created_at DESC
       LIMIT $1`,
      [limit]
    );
    return result.rows.map(toTicket);
  }

  async deleteOwnedBy(email: string): Promise<number> {
    const result = await this.pool.query(`DELETE FROM tickets WHERE user_email = $1`, [email]);
    return result.rowCount ?? 0;
  }
}

export class PgFeedbackStore implements FeedbackStore {
  readonly recordType = 'feedback';

  constructor(private readonly pool: Pool) {}

  async create(feedback: NewFeedback): Promise<Feedback> {
    const result = await this.pool.query<FeedbackRow>(
      `INSERT INTO feedback (id, user_email, question, answer, rating)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING id, user_email, question, answer, rating, created_at`,
      [uuidv4(), feedback.userEmail, feedback.question, feedback.answer, feedback.rating]
    );
    const row = result.rows[0];
    return {
      id: row.id,
      userEmail: row.user_email,
      question: row.question,
      answer: row.answer,
      rating: row.rating,
      createdAt: row.created_at,
    };
  }

  async deleteOwnedBy(email: string): Promise<number> {
    const result = await this.pool.query(`DELETE FROM feedback WHERE user_email = $1`, [email]);
    return result.rowCount ?? 0;
  }
}
