import { AlreadyExistsError, RelationNotFoundError } from '../errors';
import type { MembershipRelation } from '../stores/types';

export interface MembershipMessages {
  alreadyExists: string;
  notFound: string;
}

export async function addMembership(
  relation: MembershipRelation,
  ownerId: string,
  targetId: string,
  messages: MembershipMessages
): Promise<void> {
  const added = await relation.add(ownerId, targetId);
  if (!added) {
    throw new AlreadyExistsError(messages.alreadyExists);
  }
}

export async function removeMembership(
  relation: MembershipRelation,
  ownerId: string,
  targetId: string,
  messages: MembershipMessages
): Promise<void> {
  const removed = await relation.remove(ownerId, targetId);
  if (!removed) {
    throw new RelationNotFoundError(messages.notFound);
  }
}
