import { Organization } from '../entities/organization.entity';
import { OrganizationInternalType } from '../enums/organization-internal-type.enum';
import { SiblingPosition } from '../repositories/organization.repository.port';

type SiblingNode = Pick<Organization, 'id' | 'internalType' | 'siblingOrder'>;

/**
 * Sibling Order Utility
 *
 * Keeps the children of one parent in display order:
 * affiliated organizations first, then normal organizations.
 *
 * - Siblings that were not touched keep their relative order.
 * - A node that was just attached to the parent, or whose internal type
 *   changed, goes to the end of its group.
 */
export class SiblingOrder {
  private static readonly GROUP_ORDER: OrganizationInternalType[] = [
    OrganizationInternalType.AFFILIATED,
    OrganizationInternalType.NORMAL,
  ];

  /**
   * Compute the ordered sibling ids after `savedId` was saved
   *
   * @param siblings - All current children of the parent, including savedId
   * @param savedId - The node that was written
   * @param relocated - Whether savedId is new to this parent or changed type
   */
  static arrange(
    siblings: readonly SiblingNode[],
    savedId: string,
    relocated: boolean,
  ): string[] {
    const current = [...siblings].sort(
      (left, right) => left.siblingOrder - right.siblingOrder,
    );
    const saved = current.find((node) => node.id === savedId);
    const stayed = relocated
      ? current.filter((node) => node.id !== savedId)
      : current;

    return this.GROUP_ORDER.flatMap((internalType) => {
      const group = stayed
        .filter((node) => node.internalType === internalType)
        .map((node) => node.id);
      if (relocated && saved && saved.internalType === internalType) {
        group.push(saved.id);
      }
      return group;
    });
  }

  /**
   * Positions that differ from what is stored, for the given order
   */
  static changedPositions(
    siblings: readonly SiblingNode[],
    orderedIds: readonly string[],
  ): SiblingPosition[] {
    const storedOrder = new Map(
      siblings.map((node) => [node.id, node.siblingOrder]),
    );

    return orderedIds
      .map((id, siblingOrder) => ({ id, siblingOrder }))
      .filter((position) => storedOrder.get(position.id) !== position.siblingOrder);
  }

  /**
   * Check the invariant: no normal sibling precedes an affiliated one
   */
  static isOrdered(siblings: readonly Pick<SiblingNode, 'internalType'>[]): boolean {
    const firstNormal = siblings.findIndex(
      (node) => node.internalType === OrganizationInternalType.NORMAL,
    );
    if (firstNormal === -1) {
      return true;
    }
    return siblings
      .slice(firstNormal)
      .every((node) => node.internalType === OrganizationInternalType.NORMAL);
  }
}
