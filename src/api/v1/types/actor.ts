import type { UserRole } from "../middleware/role";

/**
 * Who is performing a mutation. Supplied by the authentication layer and
 * passed explicitly into every mutating service call.
 */
export interface ActorContext {
    userId: string;
    role: UserRole;
    ipAddress?: string;
}
