// =============================================================================
// PATHGUARD — Test Suite 05: Permission Administration
//
// Replace semantics, validation before any write, caller checks before any
// lookup, and cascading removal.
// =============================================================================

import { AdminService } from '../src/services/admin';
import { AuditService } from '../src/services/audit';
import { AuthorizationError, NotFoundError, ValidationError } from '../src/types/errors';
import { StoredProfile } from '../src/types/permissions';
import { createMemoryStores, MemoryStores, PROFILES, userProfile, vocabulary } from './helpers';

describe('Permission Administration', () => {
  let stores: MemoryStores;
  let admin: AdminService;
  const caller = userProfile('admin');

  beforeEach(async () => {
    stores = createMemoryStores();
    admin = new AdminService({
      profiles: stores.profiles,
      cascades: [stores.tickets, stores.feedback],
      vocabulary,
      audit: new AuditService(stores.audit),
    });
    await stores.profiles.modify(PROFILES.admin.email, () => structuredClone(PROFILES.admin));
  });

  async function seed(profile: StoredProfile): Promise<void> {
    await stores.profiles.modify(profile.email, () => structuredClone(profile));
  }

  describe('upsertPermissions', () => {
    test('creates a missing profile from the defaults', async () => {
      const created = await admin.upsertPermissions(caller, 'New.User@Example.com ', {
        departments: ['hr'],
      });
      expect(created).toEqual({
        email: 'new.user@example.com',
        hierarchyLevel: 0,
        departments: ['HR'],
        projects: [],
        contextualRoles: {},
        isAdmin: false,
      });
    });

    test('replaces present fields and leaves the others alone', async () => {
      await seed({
        email: 'dana@example.com',
        hierarchyLevel: 1,
        departments: ['HR', 'IT'],
        projects: ['ALPHA'],
        contextualRoles: { HR: ['LEAD'] },
      });

      const updated = await admin.upsertPermissions(caller, 'dana@example.com', {
        departments: ['Finance'],
        contextualRoles: { it: ['team lead'] },
      });

      expect(updated).toEqual({
        email: 'dana@example.com',
        hierarchyLevel: 1,
        departments: ['FINANCE'],
        projects: ['ALPHA'],
        contextualRoles: { IT: ['TEAMLEAD'] },
        isAdmin: false,
      });
    });

    test('raising a user to the top rank makes them an admin', async () => {
      const promoted = await admin.upsertPermissions(caller, 'exec@example.com', { hierarchyLevel: 3 });
      expect(promoted.isAdmin).toBe(true);
    });

    test.each([
      [{ hierarchyLevel: 4 }, 'hierarchyLevel must be between 0 and 3'],
      [{ hierarchyLevel: -1 }, 'hierarchyLevel must be between 0 and 3'],
      [{ hierarchyLevel: 1.5 }, 'hierarchyLevel must be an integer'],
      [{ departments: 'HR' }, 'departments must be an array of strings'],
      [{ projects: [42] }, 'projects must be an array of strings'],
      [{ departments: ['--'] }, 'departments contains "--", which has no letters or digits'],
      [{ contextualRoles: ['LEAD'] }, 'contextualRoles must be an object'],
      [{ isAdmin: true }, 'Unknown permission field(s): isAdmin'],
    ])('rejects %j without writing', async (update, message) => {
      await seed({ ...PROFILES.hrStaff });
      const before = await stores.profiles.get(PROFILES.hrStaff.email);

      await expect(admin.upsertPermissions(caller, PROFILES.hrStaff.email, update)).rejects.toThrow(
        message
      );
      await expect(
        admin.upsertPermissions(caller, PROFILES.hrStaff.email, update)
      ).rejects.toBeInstanceOf(ValidationError);
      expect(await stores.profiles.get(PROFILES.hrStaff.email)).toEqual(before);
    });

    test('an invalid email is rejected before the store is touched', async () => {
      await expect(admin.upsertPermissions(caller, 'not-an-email', {})).rejects.toThrow(
        'Invalid email address: "not-an-email"'
      );
      expect(await stores.profiles.get('not-an-email')).toBeNull();
    });

    test('concurrent updates to different fields of one user both land', async () => {
      await seed({ ...PROFILES.hrStaff });

      await Promise.all([
        admin.upsertPermissions(caller, PROFILES.hrStaff.email, { hierarchyLevel: 2 }),
        admin.upsertPermissions(caller, PROFILES.hrStaff.email, { projects: ['ALPHA'] }),
        admin.upsertPermissions(caller, PROFILES.hrStaff.email, { contextualRoles: { HR: ['LEAD'] } }),
      ]);

      expect(await admin.viewPermissions(caller, PROFILES.hrStaff.email)).toEqual({
        email: PROFILES.hrStaff.email,
        hierarchyLevel: 2,
        departments: ['HR'],
        projects: ['ALPHA'],
        contextualRoles: { HR: ['LEAD'] },
        isAdmin: false,
      });
    });

    test('records an audit event', async () => {
      await admin.upsertPermissions(caller, 'audited@example.com', { projects: ['BETA'] });

      const [event] = await stores.audit.query({ targetId: 'audited@example.com' });
      expect(event).toMatchObject({
        category: 'administration',
        eventType: 'permissions.created',
        actorEmail: PROFILES.admin.email,
        targetType: 'user',
        metadata: { fields: ['projects'] },
      });
      expect(event.eventHash).toMatch(/^[0-9a-f]{128}$/);
    });
  });

  describe('Audit queries', () => {
    test('an explicit limit of 0 is clamped to one event, not the default page', async () => {
      const audit = new AuditService(stores.audit);
      for (const email of ['a@example.com', 'b@example.com', 'c@example.com']) {
        await admin.upsertPermissions(caller, email, { projects: ['BETA'] });
      }

      expect(await audit.query({})).toHaveLength(3);
      const [latest, ...rest] = await audit.query({ limit: 0 });
      expect(rest).toEqual([]);
      expect(latest.targetId).toBe('c@example.com');
      expect(await audit.query({ limit: 2, offset: 2 })).toHaveLength(1);
    });
  });

  describe('viewPermissions & listUsers', () => {
    test('an unknown user is NotFound', async () => {
      await expect(admin.viewPermissions(caller, 'ghost@example.com')).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    test('lists profiles ordered by email', async () => {
      await seed({ ...PROFILES.hrStaff });
      await seed({ ...PROFILES.alphaMember });

      const users = await admin.listUsers(caller);
      expect(users.map((u) => u.email)).toEqual([
        'admin@example.com',
        'alpha@example.com',
        'hr.staff@example.com',
      ]);
    });
  });

  describe('provisionUsers', () => {
    test('adds new users with default profiles and leaves existing ones alone', async () => {
      await seed({ ...PROFILES.hrStaff });

      const report = await admin.provisionUsers(caller, [
        'New.Hire@Example.com',
        PROFILES.hrStaff.email,
        'not-an-email',
        42,
        'new.hire@example.com',
      ]);

      expect(report).toEqual({
        added: ['new.hire@example.com'],
        skipped: [PROFILES.hrStaff.email, 'new.hire@example.com'],
        errors: [
          { email: 'not-an-email', error: 'Invalid email address: "not-an-email"' },
          { email: '42', error: 'Email must be a string' },
        ],
      });
      expect(await stores.profiles.get(PROFILES.hrStaff.email)).toEqual(PROFILES.hrStaff);
      expect(await stores.profiles.get('new.hire@example.com')).toEqual({
        email: 'new.hire@example.com',
        hierarchyLevel: 0,
        departments: [],
        projects: [],
        contextualRoles: {},
      });

      const [event] = await stores.audit.query({ eventType: 'users.provisioned' });
      expect(event.metadata).toEqual({ added: ['new.hire@example.com'], skipped: 2, errors: 2 });
    });

    test('rejects anything but an array before touching the store', async () => {
      const modifications = jest.spyOn(stores.profiles, 'modify');
      await expect(admin.provisionUsers(caller, 'a@example.com')).rejects.toThrow(
        'emails must be an array'
      );
      expect(modifications).not.toHaveBeenCalled();
    });
  });

  describe('Caller checks', () => {
    const outsider = userProfile('hrManager');

    test('non-admins are rejected before any lookup', async () => {
      const lookups = jest.spyOn(stores.profiles, 'get');
      const modifications = jest.spyOn(stores.profiles, 'modify');

      await expect(admin.viewPermissions(outsider, 'ghost@example.com')).rejects.toBeInstanceOf(
        AuthorizationError
      );
      await expect(admin.upsertPermissions(outsider, 'ghost@example.com', {})).rejects.toBeInstanceOf(
        AuthorizationError
      );
      await expect(admin.removeUser(outsider, 'ghost@example.com')).rejects.toBeInstanceOf(
        AuthorizationError
      );
      await expect(admin.listUsers(outsider)).rejects.toBeInstanceOf(AuthorizationError);
      await expect(admin.provisionUsers(outsider, ['ghost@example.com'])).rejects.toBeInstanceOf(
        AuthorizationError
      );

      expect(lookups).not.toHaveBeenCalled();
      expect(modifications).not.toHaveBeenCalled();
    });
  });

  describe('removeUser', () => {
    test('deletes the profile and every record the user owns', async () => {
      await seed({ ...PROFILES.hrStaff });
      await stores.tickets.create({
        userEmail: PROFILES.hrStaff.email,
        question: 'Where is the leave policy?',
        chatHistory: '',
        team: 'HR',
      });
      await stores.tickets.create({
        userEmail: PROFILES.admin.email,
        question: 'Printer on floor 2',
        chatHistory: '',
        team: 'IT',
      });
      await stores.feedback.create({
        userEmail: PROFILES.hrStaff.email,
        question: 'Leave policy?',
        answer: 'See the HR handbook.',
        rating: 'helpful',
      });

      const result = await admin.removeUser(caller, PROFILES.hrStaff.email);

      expect(result).toEqual({
        email: PROFILES.hrStaff.email,
        deletedRecords: { ticket: 1, feedback: 1 },
      });
      expect(await stores.profiles.get(PROFILES.hrStaff.email)).toBeNull();
      expect(await stores.feedback.listFor(PROFILES.hrStaff.email)).toEqual([]);

      const remaining = await stores.tickets.listRecent(10);
      expect(remaining.map((t) => t.userEmail)).toEqual([PROFILES.admin.email]);
    });

    test('a ticket written while the profile is being removed is deleted too', async () => {
      await seed({ ...PROFILES.hrStaff });
      const remove = stores.profiles.remove.bind(stores.profiles);
      jest.spyOn(stores.profiles, 'remove').mockImplementation(async (email) => {
        await stores.tickets.create({
          userEmail: email,
          question: 'Sent just before removal',
          chatHistory: '',
          team: 'HR',
        });
        return remove(email);
      });

      const result = await admin.removeUser(caller, PROFILES.hrStaff.email);

      expect(result.deletedRecords).toEqual({ ticket: 1, feedback: 0 });
      expect(await stores.tickets.listRecent(10)).toEqual([]);
    });

    test('an unknown user is NotFound and nothing is deleted', async () => {
      await stores.tickets.create({
        userEmail: 'ghost@example.com',
        question: 'Orphan',
        chatHistory: '',
        team: 'General',
      });

      await expect(admin.removeUser(caller, 'ghost@example.com')).rejects.toThrow(
        'User not found: ghost@example.com'
      );
      expect(await stores.tickets.listRecent(10)).toHaveLength(1);
    });
  });
});
