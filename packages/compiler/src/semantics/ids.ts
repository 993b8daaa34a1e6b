/**
 * Identifier aliases shared by the type arena, the protocol table and the
 * generics layer. Callers should treat them as opaque handles.
 */
export type TypeId = number;
export type ArchetypeId = number;
export type ProtocolId = number;
