import type { ActorAddress, AppState, DocumentRecord } from "@/lib/types";

export function isOwner(state: Pick<AppState, "owner">, actor: ActorAddress): boolean {
  return state.owner === actor;
}

export function isReviewer(state: Pick<AppState, "reviewers">, actor: ActorAddress): boolean {
  return state.reviewers.includes(actor);
}

export function isSubmitterOrReviewer(
  state: Pick<AppState, "reviewers">,
  document: Pick<DocumentRecord, "submitter">,
  actor: ActorAddress
): boolean {
  return document.submitter === actor || isReviewer(state, actor);
}
