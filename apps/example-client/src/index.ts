export { PetStoreClient } from './PetStoreClient';
export { Pet, NewPet, PetChanges, Tag, PET_STATUSES } from './api/Pet';
export type { PetStatus } from './api/Pet';
export { UnauthorizedError, PetInUseError } from './errors';
