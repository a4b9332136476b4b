import { failure, type ApiFailure } from "@/lib/api/errors";
import type { Caller } from "@/lib/domain/callers";

export const SAFE_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

/**
 * Ownership capability. Offers, reviews and profiles each implement it on their own
 * terms; permission checks only ever see this interface.
 */
export interface HasOwner {
  hasOwner(caller: Caller): boolean;
}

export type PermissionContext<R = undefined> = {
  caller: Caller | null;
  method: string;
  resource: R;
};

export type Permission<R = undefined> = (context: PermissionContext<R>) => boolean;

export type AuthorizationResult = { ok: true } | ApiFailure;

export function offerOwnership(offer: { creator_id: number }): HasOwner {
  return { hasOwner: (caller) => caller.id === offer.creator_id };
}

export function reviewOwnership(review: { reviewer_id: number }): HasOwner {
  return { hasOwner: (caller) => caller.id === review.reviewer_id };
}

export function profileOwnership(profile: { user: number }): HasOwner {
  return { hasOwner: (caller) => caller.id === profile.user };
}

export const isAuthenticated: Permission<unknown> = ({ caller }) => caller !== null;

export const isSafeMethod: Permission<unknown> = ({ method }) =>
  SAFE_METHODS.has(method.toUpperCase());

export const isBusinessUser: Permission<unknown> = ({ caller }) =>
  caller?.userType === "business";

export const isCustomerUser: Permission<unknown> = ({ caller }) =>
  caller?.userType === "customer";

export const isStaff: Permission<unknown> = ({ caller }) => caller?.isStaff === true;

export const isOwner: Permission<HasOwner> = ({ caller, resource }) =>
  caller !== null && resource.hasOwner(caller);

export const isOrderBusinessPartner: Permission<{ business_user_id: number }> = ({
  caller,
  resource,
}) => caller !== null && caller.id === resource.business_user_id;

export const isOrderParticipant: Permission<{
  business_user_id: number;
  customer_user_id: number;
}> = ({ caller, resource }) =>
  caller !== null &&
  (caller.id === resource.business_user_id || caller.id === resource.customer_user_id);

export function allOf<R>(...permissions: Permission<R>[]): Permission<R> {
  return (context) => permissions.every((permission) => permission(context));
}

export function anyOf<R>(...permissions: Permission<R>[]): Permission<R> {
  return (context) => permissions.some((permission) => permission(context));
}

/** Read for any authenticated caller, write for the owner only. */
export const isOwnerOrReadOnly: Permission<HasOwner> = allOf<HasOwner>(
  isAuthenticated,
  anyOf<HasOwner>(isSafeMethod, isOwner),
);

export function authorize<R>(
  permission: Permission<R>,
  context: PermissionContext<R>,
  message = "You do not have permission to perform this action.",
): AuthorizationResult {
  if (permission(context)) {
    return { ok: true };
  }

  if (!context.caller) {
    return failure("unauthorized", "Authentication credentials were not provided or are invalid.");
  }

  return failure("forbidden", message);
}
