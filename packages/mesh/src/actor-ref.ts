import { randomUUID } from "node:crypto";
import type { AskOptions, MeshEnvelope, MessageSender, SendOptions } from "./types.js";

/**
 * A typed handle to an actor. Holds only the actor's ID and the router,
 * never the Actor object, so refs can be shared freely (the board hands
 * the same refs to every neighbor counter).
 *
 * `M` is the actor's message union: the compiler rejects any payload
 * outside it at the send site.
 */
export class ActorRef<M> {
	readonly actorId: string;
	private readonly router: MessageSender;

	constructor(actorId: string, router: MessageSender) {
		this.actorId = actorId;
		this.router = router;
	}

	/**
	 * Fire-and-forget send to this actor.
	 */
	tell(from: string, payload: M, opts?: SendOptions): void {
		const envelope: MeshEnvelope<M> = {
			id: randomUUID(),
			from,
			to: this.actorId,
			type: "tell",
			payload,
			priority: opts?.priority ?? 1,
			timestamp: Date.now(),
		};
		this.router.route(envelope);
	}

	/**
	 * Send and await the reply envelope from this actor.
	 */
	ask(from: string, payload: M, opts?: AskOptions): Promise<MeshEnvelope> {
		return this.router.ask(from, this.actorId, payload, opts);
	}

	equals(other: { readonly actorId: string }): boolean {
		return this.actorId === other.actorId;
	}

	toString(): string {
		return `ActorRef(${this.actorId})`;
	}
}
