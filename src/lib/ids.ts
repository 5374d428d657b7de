import { monotonicFactory } from 'ulid';

/**
 * Server-generated identifiers. Monotonic within a millisecond so ids
 * created in one burst still sort in creation order.
 */
export const newId = monotonicFactory();
