import { NotAuthenticatedError } from '../../shared/domain/errors/domain.errors';

/** The caller's user id, or NotAuthenticatedError when there is none. */
export function requireActor(actorId: string | undefined): string {
  if (!actorId) {
    throw new NotAuthenticatedError();
  }
  return actorId;
}
