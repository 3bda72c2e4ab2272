// =============================================================================
// PATHGUARD — Permission Administration
//
// View, upsert and remove user access profiles. Every operation checks the
// caller against the admin-override clause before it looks anything up, so
// a non-admin learns nothing about which users exist.
// =============================================================================

import { hasAdminOverride } from '../../authorization/evaluator';
import {
  applyProfileUpdate,
  defaultProfile,
  normalizeEmail,
  parseProfileUpdate,
  toUserProfile,
} from '../../authorization/profile';
import { AuthorizationError, NotFoundError, ValidationError } from '../../types/errors';
import { UserProfile } from '../../types/permissions';
import { OwnedRecordCascade, ProfileStore } from '../../types/stores';
import { TagVocabulary } from '../../types/vocabulary';
import { AuditService } from '../audit';

export interface AdminServiceDeps {
  profiles: ProfileStore;
  /** Stores holding records owned by a user, emptied on removal */
  cascades: readonly OwnedRecordCascade[];
  vocabulary: TagVocabulary;
  audit: AuditService;
}

export interface RemovalResult {
  email: string;
  /** Deleted record counts per record type */
  deletedRecords: Record<string, number>;
}

export interface ProvisionReport {
  added: string[];
  /** Already had a profile, or repeated in the list */
  skipped: string[];
  errors: Array<{ email: string; error: string }>;
}

export const MAX_PROVISION_BATCH = 1000;

export class AdminService {
  private readonly profiles: ProfileStore;
  private readonly cascades: readonly OwnedRecordCascade[];
  private readonly vocabulary: TagVocabulary;
  private readonly audit: AuditService;

  constructor(deps: AdminServiceDeps) {
    this.profiles = deps.profiles;
    this.cascades = deps.cascades;
    this.vocabulary = deps.vocabulary;
    this.audit = deps.audit;
  }

  async listUsers(caller: UserProfile): Promise<UserProfile[]> {
    this.assertAdmin(caller);
    const stored = await this.profiles.list();
    return stored.map((profile) => toUserProfile(profile, this.vocabulary));
  }

  /** @throws NotFoundError when no profile exists for the email */
  async viewPermissions(caller: UserProfile, email: unknown): Promise<UserProfile> {
    this.assertAdmin(caller);
    const key = normalizeEmail(email);

    const stored = await this.profiles.get(key);
    if (!stored) {
      throw new NotFoundError(`User not found: ${key}`);
    }
    return toUserProfile(stored, this.vocabulary);
  }

  /**
   * Create or partially update a profile. Each field present in the update
   * replaces the stored field; a missing profile starts from the defaults.
   * The update is validated in full before the store is touched.
   */
  async upsertPermissions(
    caller: UserProfile,
    email: unknown,
    update: unknown
  ): Promise<UserProfile> {
    this.assertAdmin(caller);
    const key = normalizeEmail(email);
    const parsed = parseProfileUpdate(update, this.vocabulary);

    const { profile, created } = await this.profiles.modify(key, (current) =>
      applyProfileUpdate(current ?? defaultProfile(key, this.vocabulary), parsed)
    );

    console.log(`[Admin] ${caller.email} ${created ? 'created' : 'updated'} permissions for ${key}`);
    await this.audit.record({
      category: 'administration',
      eventType: created ? 'permissions.created' : 'permissions.updated',
      description: `Permissions ${created ? 'created' : 'updated'} for ${key}`,
      actorEmail: caller.email,
      targetType: 'user',
      targetId: key,
      metadata: { fields: Object.keys(parsed) },
    });

    return toUserProfile(profile, this.vocabulary);
  }

  /**
   * Create default profiles for a batch of emails. Existing profiles are left
   * untouched; malformed entries are reported and do not stop the batch.
   */
  async provisionUsers(caller: UserProfile, emails: unknown): Promise<ProvisionReport> {
    this.assertAdmin(caller);
    if (!Array.isArray(emails)) {
      throw new ValidationError('emails must be an array', 'emails');
    }
    if (emails.length > MAX_PROVISION_BATCH) {
      throw new ValidationError(`At most ${MAX_PROVISION_BATCH} emails per request`, 'emails');
    }

    const report: ProvisionReport = { added: [], skipped: [], errors: [] };
    const seen = new Set<string>();

    for (const entry of emails) {
      let key: string;
      try {
        key = normalizeEmail(entry);
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err;
        report.errors.push({ email: String(entry), error: err.message });
        continue;
      }
      if (seen.has(key)) {
        report.skipped.push(key);
        continue;
      }
      seen.add(key);

      const { created } = await this.profiles.modify(
        key,
        (current) => current ?? defaultProfile(key, this.vocabulary)
      );
      (created ? report.added : report.skipped).push(key);
    }

    console.log(
      `[Admin] ${caller.email} provisioned users: ${report.added.length} added, ` +
        `${report.skipped.length} skipped, ${report.errors.length} errors`
    );
    await this.audit.record({
      category: 'administration',
      eventType: 'users.provisioned',
      description: `${report.added.length} user(s) provisioned`,
      actorEmail: caller.email,
      targetType: 'user',
      metadata: {
        added: report.added,
        skipped: report.skipped.length,
        errors: report.errors.length,
      },
    });

    return report;
  }

  /**
   * Remove a user together with every record they own.
   * @throws NotFoundError when no profile exists for the email
   */
  async removeUser(caller: UserProfile, email: unknown): Promise<RemovalResult> {
    this.assertAdmin(caller);
    const key = normalizeEmail(email);

    if (!(await this.profiles.get(key))) {
      throw new NotFoundError(`User not found: ${key}`);
    }

    const deletedRecords: Record<string, number> = {};
    await this.deleteOwnedRecords(key, deletedRecords);
    await this.profiles.remove(key);
    // Records written between the first pass and the removal
    await this.deleteOwnedRecords(key, deletedRecords);

    console.log(`[Admin] ${caller.email} removed user ${key}`);
    await this.audit.record({
      category: 'administration',
      eventType: 'user.removed',
      description: `User ${key} removed`,
      actorEmail: caller.email,
      targetType: 'user',
      targetId: key,
      metadata: { deletedRecords },
    });

    return { email: key, deletedRecords };
  }

  private async deleteOwnedRecords(email: string, counts: Record<string, number>): Promise<void> {
    for (const cascade of this.cascades) {
      counts[cascade.recordType] = (counts[cascade.recordType] ?? 0) + (await cascade.deleteOwnedBy(email));
    }
  }

  private assertAdmin(caller: UserProfile): void {
    if (!hasAdminOverride(caller)) {
      throw new AuthorizationError('Administrator privileges required');
    }
  }
}
