import { BadRequestException, NotFoundException } from '@nestjs/common';
import {
  InMemoryHierarchyStore,
  InMemoryOrganizationRepository,
  buildNewOrganization,
} from '../../../../test/utils/in-memory-hierarchy';
import { OrganizationInternalType } from '../enums/organization-internal-type.enum';
import { OrganizationTree } from './organization-tree.domain.service';

describe('OrganizationTree', () => {
  let store: InMemoryHierarchyStore;
  let tree: OrganizationTree;

  beforeEach(async () => {
    store = new InMemoryHierarchyStore();
    tree = new OrganizationTree(new InMemoryOrganizationRepository(store));
    await tree.create(buildNewOrganization({ id: 'test:root', name: 'Root' }));
  });

  describe('create', () => {
    it('should order an affiliated child before a normal child added earlier', async () => {
      await tree.create(
        buildNewOrganization({ id: 'test:normal', parentId: 'test:root' }),
      );
      await tree.create(
        buildNewOrganization({
          id: 'test:affiliated',
          parentId: 'test:root',
          internalType: OrganizationInternalType.AFFILIATED,
        }),
      );

      expect(store.childIds('test:root')).toEqual([
        'test:affiliated',
        'test:normal',
      ]);
    });

    it('should order an affiliated child before a normal child added later', async () => {
      await tree.create(
        buildNewOrganization({
          id: 'test:affiliated',
          parentId: 'test:root',
          internalType: OrganizationInternalType.AFFILIATED,
        }),
      );
      await tree.create(
        buildNewOrganization({ id: 'test:normal', parentId: 'test:root' }),
      );

      expect(store.childIds('test:root')).toEqual([
        'test:affiliated',
        'test:normal',
      ]);
    });

    it('should keep creation order among normal children', async () => {
      for (const id of ['test:a', 'test:b', 'test:c']) {
        await tree.create(buildNewOrganization({ id, parentId: 'test:root' }));
      }

      expect(store.childIds('test:root')).toEqual([
        'test:a',
        'test:b',
        'test:c',
      ]);
    });

    it('should throw NotFoundException for an unknown parent', async () => {
      await expect(
        tree.create(
          buildNewOrganization({ id: 'test:orphan', parentId: 'test:missing' }),
        ),
      ).rejects.toThrow(NotFoundException);
    });
  });

  describe('update', () => {
    beforeEach(async () => {
      await tree.create(
        buildNewOrganization({
          id: 'test:affiliated',
          parentId: 'test:root',
          internalType: OrganizationInternalType.AFFILIATED,
        }),
      );
      await tree.create(
        buildNewOrganization({ id: 'test:normal', parentId: 'test:root' }),
      );
    });

    it('should move a child that became normal after its normal siblings', async () => {
      const current = store.organizations.get('test:affiliated');
      if (!current) throw new Error('fixture missing');

      const updated = await tree.update(current, {
        internalType: OrganizationInternalType.NORMAL,
      });

      expect(updated.internalType).toBe(OrganizationInternalType.NORMAL);
      expect(store.childIds('test:root')).toEqual([
        'test:normal',
        'test:affiliated',
      ]);
    });

    it('should keep the position when only the name changes', async () => {
      const current = store.organizations.get('test:affiliated');
      if (!current) throw new Error('fixture missing');

      await tree.update(current, { name: 'Renamed' });

      expect(store.childIds('test:root')).toEqual([
        'test:affiliated',
        'test:normal',
      ]);
      expect(store.organizations.get('test:affiliated')?.name).toBe('Renamed');
    });

    it('should never change the id', async () => {
      const current = store.organizations.get('test:normal');
      if (!current) throw new Error('fixture missing');

      const updated = await tree.update(current, {
        originId: 'changed',
        dataSourceId: 'other',
      });

      expect(updated.id).toBe('test:normal');
      expect(updated.originId).toBe('changed');
    });
  });

  describe('move', () => {
    beforeEach(async () => {
      await tree.create(
        buildNewOrganization({ id: 'test:child', parentId: 'test:root' }),
      );
      await tree.create(
        buildNewOrganization({ id: 'test:grandchild', parentId: 'test:child' }),
      );
    });

    it('should reject moving an organization under itself', async () => {
      const child = store.organizations.get('test:child');
      if (!child) throw new Error('fixture missing');

      await expect(tree.move(child, 'test:child')).rejects.toThrow(
        BadRequestException,
      );
    });

    it('should reject moving an organization under its descendant', async () => {
      const root = store.organizations.get('test:root');
      if (!root) throw new Error('fixture missing');

      await expect(tree.move(root, 'test:grandchild')).rejects.toThrow(
        BadRequestException,
      );
    });

    it('should append a moved organization to the end of its new siblings', async () => {
      const grandchild = store.organizations.get('test:grandchild');
      if (!grandchild) throw new Error('fixture missing');

      const moved = await tree.move(grandchild, 'test:root');

      expect(moved.parentId).toBe('test:root');
      expect(store.childIds('test:root')).toEqual([
        'test:child',
        'test:grandchild',
      ]);
      expect(store.childIds('test:child')).toEqual([]);
    });
  });

  describe('replace', () => {
    beforeEach(async () => {
      await tree.create(buildNewOrganization({ id: 'test:old' }));
      await tree.create(buildNewOrganization({ id: 'test:new' }));
    });

    it('should set replacedById', async () => {
      const [current, replacement] = ['test:old', 'test:new'].map((id) =>
        store.organizations.get(id),
      );
      if (!current || !replacement) throw new Error('fixture missing');

      const replaced = await tree.replace(current, replacement);

      expect(replaced.replacedById).toBe('test:new');
    });

    it('should reject a replacement that has itself been replaced', async () => {
      const current = store.organizations.get('test:old');
      const replacement = store.organizations.get('test:new');
      const root = store.organizations.get('test:root');
      if (!current || !replacement || !root) throw new Error('fixture missing');
      const replacedReplacement = await tree.replace(replacement, root);

      await expect(tree.replace(current, replacedReplacement)).rejects.toThrow(
        'Organization test:new has already been replaced by test:root',
      );
    });

    it('should reject replacing an organization with itself', async () => {
      const current = store.organizations.get('test:old');
      if (!current) throw new Error('fixture missing');

      await expect(tree.replace(current, current)).rejects.toThrow(
        BadRequestException,
      );
    });
  });

  describe('read helpers', () => {
    beforeEach(async () => {
      await tree.create(
        buildNewOrganization({
          id: 'test:board',
          name: 'Board',
          parentId: 'test:root',
        }),
      );
      await tree.create(
        buildNewOrganization({
          id: 'test:club',
          name: 'Club',
          parentId: 'test:root',
          internalType: OrganizationInternalType.AFFILIATED,
        }),
      );
      await tree.create(
        buildNewOrganization({
          id: 'test:office',
          name: 'Office',
          parentId: 'test:board',
          dissolutionDate: '2020-12-31',
        }),
      );
    });

    it('should split children into sub and affiliated organizations', async () => {
      const sub = await tree.subOrganizations('test:root');
      const affiliated = await tree.affiliatedOrganizations('test:root');

      expect(sub.map((organization) => organization.id)).toEqual([
        'test:board',
      ]);
      expect(affiliated.map((organization) => organization.id)).toEqual([
        'test:club',
      ]);
    });

    it('should list ancestors from the root down', async () => {
      const ancestors = await tree.ancestors('test:office');

      expect(ancestors.map((organization) => organization.id)).toEqual([
        'test:root',
        'test:board',
      ]);
    });

    it('should list all descendants', async () => {
      const descendants = await tree.descendants('test:root');

      expect(descendants.map((organization) => organization.id).sort()).toEqual(
        ['test:board', 'test:club', 'test:office'],
      );
    });

    it('should prefix the parent name and mark dissolved organizations', async () => {
      const office = store.organizations.get('test:office');
      const root = store.organizations.get('test:root');
      if (!office || !root) throw new Error('fixture missing');

      await expect(tree.displayName(office)).resolves.toBe(
        'Board / Office (dissolved)',
      );
      await expect(tree.displayName(root)).resolves.toBe('Root');
    });
  });
});
