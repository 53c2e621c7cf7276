import { augment, elideManaged, resetPayload } from '../PermissionInvariants';
import { AccessControlChange, ObjectACL, ObjectTypeName } from '../../../types';
import { CreatorLookup } from '../../creator.service';
import { CancelledError } from '../../../utils/errors';

const user = (name: string, permissionLevel: string): AccessControlChange => ({
  principal: { kind: 'user', name },
  permissionLevel,
});

const admins = (permissionLevel = 'CAN_MANAGE'): AccessControlChange => ({
  principal: { kind: 'group', name: 'admins' },
  permissionLevel,
});

const withAdmins = (objectType: string): ObjectACL => ({
  object_type: objectType,
  access_control_list: [
    { group_name: 'admins', all_permissions: [{ permission_level: 'CAN_MANAGE', inherited: false }] },
  ],
});

const inheritedAdmins: ObjectACL = {
  object_type: 'notebook',
  access_control_list: [
    { group_name: 'admins', all_permissions: [{ permission_level: 'CAN_MANAGE', inherited: true }] },
  ],
};

function creators(names: Partial<Record<ObjectTypeName, string>>) {
  const calls: string[] = [];
  const lookup: CreatorLookup = {
    getCreator: async (objectType, objectId) => {
      calls.push(`${objectType}:${objectId}`);
      return names[objectType] ?? 'unknown';
    },
  };
  return { lookup, calls };
}

describe('PermissionInvariants', () => {
  describe('augment', () => {
    it('should leave plain types alone', () => {
      expect(augment('cluster', [user('ben', 'CAN_RESTART')], 'me')).toEqual([user('ben', 'CAN_RESTART')]);
    });

    it('should add the caller as owner of an ownerless job', () => {
      expect(augment('job', [user('ben', 'CAN_VIEW')], 'me')).toEqual([
        user('ben', 'CAN_VIEW'),
        user('me', 'IS_OWNER'),
      ]);
    });

    it('should raise a declared caller entry to owner instead of adding another', () => {
      expect(augment('job', [user('me', 'CAN_MANAGE'), user('ben', 'CAN_VIEW')], 'me')).toEqual([
        user('me', 'IS_OWNER'),
        user('ben', 'CAN_VIEW'),
      ]);
    });

    it('should keep a declared owner', () => {
      expect(augment('pipeline', [user('ben', 'IS_OWNER')], 'me')).toEqual([user('ben', 'IS_OWNER')]);
    });

    it('should give the caller CAN_MANAGE on SQL objects unless declared', () => {
      expect(augment('sql-query', [user('ben', 'CAN_VIEW')], 'me')).toEqual([
        user('ben', 'CAN_VIEW'),
        user('me', 'CAN_MANAGE'),
      ]);
      expect(augment('sql-query', [user('me', 'CAN_EDIT')], 'me')).toEqual([user('me', 'CAN_EDIT')]);
    });

    it('should re-assert admins only when granted directly', () => {
      expect(augment('notebook', [user('ben', 'CAN_READ')], 'me', withAdmins('notebook'))).toEqual([
        user('ben', 'CAN_READ'),
        admins(),
      ]);
      expect(augment('notebook', [user('ben', 'CAN_READ')], 'me', inheritedAdmins)).toEqual([
        user('ben', 'CAN_READ'),
      ]);
    });

    it('should raise an admins entry to CAN_MANAGE', () => {
      expect(augment('cluster', [admins('CAN_ATTACH_TO')], 'me')).toEqual([admins()]);
    });

    it('should pin admins on tokens', () => {
      expect(augment('tokens', [user('ben', 'CAN_USE')], 'me')).toEqual([user('ben', 'CAN_USE'), admins()]);
    });

    it('should leave admins on passwords to the declaration', () => {
      expect(augment('passwords', [user('ben', 'CAN_USE')], 'me', withAdmins('passwords'))).toEqual([
        user('ben', 'CAN_USE'),
      ]);
      expect(augment('passwords', [admins('CAN_USE')], 'me')).toEqual([admins('CAN_USE')]);
    });

    it('should drop duplicate principals', () => {
      expect(augment('cluster', [user('ben', 'CAN_RESTART'), user('ben', 'CAN_MANAGE')], 'me')).toEqual([
        user('ben', 'CAN_RESTART'),
      ]);
    });
  });

  describe('resetPayload', () => {
    it('should empty a type without admins or creator', async () => {
      const { lookup, calls } = creators({});

      await expect(resetPayload('cluster', '/clusters/abc', { object_type: 'cluster' }, lookup)).resolves.toEqual([]);
      expect(calls).toEqual([]);
    });

    it('should keep directly granted admins', async () => {
      const { lookup } = creators({});

      await expect(resetPayload('instance-pool', '/instance-pools/p', withAdmins('instance-pool'), lookup))
        .resolves.toEqual([admins()]);
    });

    it('should hand ownership back to the creator', async () => {
      const { lookup, calls } = creators({ pipeline: 'creator@example.com' });

      await expect(resetPayload('pipeline', '/pipelines/p-1', withAdmins('pipeline'), lookup)).resolves.toEqual([
        admins(),
        user('creator@example.com', 'IS_OWNER'),
      ]);
      expect(calls).toEqual(['pipeline:p-1']);
    });

    it('should keep admins on tokens but not passwords', async () => {
      const { lookup } = creators({});

      await expect(resetPayload('tokens', '/authorization/tokens', { object_type: 'tokens' }, lookup))
        .resolves.toEqual([admins()]);
      await expect(resetPayload('passwords', '/authorization/passwords', withAdmins('passwords'), lookup))
        .resolves.toEqual([]);
    });

    it('should not look up the creator once aborted', async () => {
      const { lookup, calls } = creators({ job: 'creator@example.com' });
      const controller = new AbortController();
      controller.abort();

      await expect(resetPayload('job', '/jobs/1', { object_type: 'job' }, lookup, controller.signal))
        .rejects.toBeInstanceOf(CancelledError);
      expect(calls).toEqual([]);
    });
  });

  describe('elideManaged', () => {
    it('should hide admins where the system manages them', () => {
      expect(elideManaged({ objectType: 'tokens', accessControlList: [user('ben', 'CAN_USE'), admins()] }))
        .toEqual({ objectType: 'tokens', accessControlList: [user('ben', 'CAN_USE')] });
    });

    it('should keep admins on passwords', () => {
      const entity = { objectType: 'passwords' as const, accessControlList: [admins('CAN_USE')] };

      expect(elideManaged(entity)).toBe(entity);
    });
  });
});
