/**
 * @shipledger/lifecycle — Shipment lifecycle rules and projection.
 *
 * - LifecycleGraph: closed-world table of legal transitions
 * - AuthorityMatrix: one owning role per state
 * - TransitionValidator: graph check, then authority check
 * - Projector: deterministic fold of a shipment's events
 *
 * @packageDocumentation
 */

export { LifecycleGraph, LifecycleGraphError, LIFECYCLE_EDGES } from "./graph.js";
export type { LifecycleEdge, LifecycleGraphErrorCode } from "./graph.js";

export { AuthorityMatrix, AuthorityError, AUTHORITY_GRANTS } from "./authority.js";
export type { AuthorityGrant, AuthorityErrorCode } from "./authority.js";

export { TransitionValidator } from "./validator.js";
export type { ValidationResult, ValidationRejectionCode } from "./validator.js";

export { Projector, ProjectorError, projectEvents } from "./projector.js";
export type { ProjectionOptions, ProjectorErrorCode } from "./projector.js";
