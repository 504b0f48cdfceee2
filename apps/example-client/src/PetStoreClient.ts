import 'reflect-metadata';
import {
    ArrayOf,
    BaseClient,
    ClientConfig,
    Delete,
    Get,
    Param,
    Patch,
    Post,
    Rest,
    routeStub,
} from '@restwire/http-client';
import { NewPet, Pet, PetChanges, PetStatus, Tag } from './api/Pet';
import { throwPetInUse, throwUnauthorized } from './errors';

/**
 * PetStoreClient - Client of the pet store REST API.
 *
 * ```typescript
 * const transport = new FetchTransport({ headers: { 'x-api-key': apiKey } });
 * const client = new PetStoreClient(new ClientConfig('https://pets.example.com/v1', transport));
 * const pets = await client.listPets('available', 20);
 * ```
 */
export class PetStoreClient extends BaseClient {
    constructor(config: ClientConfig) {
        super(config);
        this.registerErrorHandler('', 401, throwUnauthorized);
        this.registerErrorHandler('DELETE', 409, throwPetInUse);
    }

    @Get('pets', { result: ArrayOf(Pet) })
    listPets(
        @Param('status', { optional: true }) status?: PetStatus,
        @Param('limit', { default: 50 }) limit?: number,
    ): Promise<Pet[]> {
        return routeStub();
    }

    @Get('pets/{petId}', { result: Pet })
    getPet(@Param('petId') petId: number): Promise<Pet> {
        return routeStub();
    }

    @Post('pets', { result: Pet })
    addPet(@Param('body') body: NewPet): Promise<Pet> {
        return routeStub();
    }

    // PUT replaces the whole pet
    @Rest('pets/{petId}', { method: 'PUT', body: 'pet', result: Pet })
    updatePet(@Param('petId') petId: number, @Param('pet') pet: NewPet): Promise<Pet> {
        return routeStub();
    }

    @Patch('pets/{petId}', { body: 'changes', result: Pet })
    renamePet(@Param('petId') petId: number, @Param('changes') changes: PetChanges): Promise<Pet> {
        return routeStub();
    }

    @Rest('pets/{petId}/tags', { method: 'PUT', body: 'tags', result: Pet })
    replaceTags(
        @Param('petId') petId: number,
        @Param('tags', { type: ArrayOf(Tag) }) tags: Tag[],
    ): Promise<Pet> {
        return routeStub();
    }

    @Delete('pets/{petId}')
    deletePet(@Param('petId') petId: number, @Param('reason', { optional: true }) reason?: string): Promise<unknown> {
        return routeStub();
    }
}
