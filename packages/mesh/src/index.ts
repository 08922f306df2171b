/**
 * @toroid/mesh — in-process actor runtime.
 *
 * Typed actor refs, priority mailboxes, request-reply routing with
 * timeouts, and an ActorSystem that supervises actor faults.
 */

// Types
export type {
	ActorBehavior,
	ActorContext,
	ActorFault,
	ActorSystemConfig,
	AskOptions,
	FaultHandler,
	MeshEnvelope,
	MeshPriority,
	MessageGuard,
	MessageReceiver,
	MessageSender,
	SendOptions,
} from "./types.js";

// Mailbox
export { ActorMailbox } from "./actor-mailbox.js";

// Actor
export { Actor } from "./actor.js";
export type { ActorOptions } from "./actor.js";
export { ActorRef } from "./actor-ref.js";

// Router
export { MeshRouter } from "./mesh-router.js";
export type { RouterEvent } from "./mesh-router.js";

// System
export { ActorSystem } from "./actor-system.js";
export type { SpawnOptions, SystemEvent } from "./actor-system.js";
