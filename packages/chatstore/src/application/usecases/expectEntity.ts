import type { ChatEntity } from "../../domain/entities/ChatEntity";

export function expectEntity<E extends ChatEntity>(
  entity: ChatEntity,
  isKind: (entity: ChatEntity) => entity is E
): E {
  if (!isKind(entity)) {
    throw new Error(`Unexpected ${entity.kind} ${entity.number} returned by the store`);
  }
  return entity;
}
