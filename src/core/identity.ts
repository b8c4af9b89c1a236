/**
 * Idea identity — `idea_id` is a UUID v5 of the source repository and the
 * pathway, so regenerating an idea always lands on the same pool key no
 * matter how its title or description templates change.
 */
import { v5 as uuidv5 } from "uuid";
import type { Pathway } from "../schemas/idea.js";

/** Namespace for every idea id this project derives. Never change it. */
export const IDEA_ID_NAMESPACE = "3b241101-e2bb-4255-8caf-4136c566a962";

export function ideaId(owner: string, name: string, pathway: Pathway): string {
    const key = `${owner.trim().toLowerCase()}/${name.trim().toLowerCase()}#${pathway}`;
    return uuidv5(key, IDEA_ID_NAMESPACE);
}
