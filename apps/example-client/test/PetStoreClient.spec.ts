import { ApiError, ClientConfig, FetchTransport, NotFoundError, SerializationError } from '@restwire/http-client';
import { NewPet, Pet, PetChanges, Tag } from '../src/api/Pet';
import { PetInUseError, UnauthorizedError } from '../src/errors';
import { PetStoreClient } from '../src/PetStoreClient';

function jsonResponse(status: number, body: unknown, statusText = ''): Response {
    return new Response(JSON.stringify(body), {
        status,
        statusText,
        headers: { 'Content-Type': 'application/json' },
    });
}

function tag(id: number, name: string): Tag {
    return Object.assign(new Tag(), { id, name });
}

const rexJson = { id: 3, name: 'Rex', status: 'available', tags: [{ id: 1, name: 'dog' }] };

describe('PetStoreClient', () => {
    const headers = { Accept: 'application/json', 'x-api-key': 'test-key' };
    const jsonHeaders = { ...headers, 'Content-Type': 'application/json' };
    let mockFetch: jest.Mock<Promise<Response>, Parameters<typeof fetch>>;
    let originalFetch: typeof fetch;
    let client: PetStoreClient;

    beforeEach(() => {
        originalFetch = global.fetch;
        mockFetch = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
        global.fetch = mockFetch;

        const transport = new FetchTransport({ headers: { 'x-api-key': 'test-key' } });
        client = new PetStoreClient(new ClientConfig('http://localhost:3000/', transport, false));
    });

    afterEach(() => {
        global.fetch = originalFetch;
    });

    it('should list pets with the filters in the query string', async () => {
        mockFetch.mockResolvedValueOnce(jsonResponse(200, [rexJson]));

        const pets = await client.listPets('available', 10);

        expect(mockFetch).toHaveBeenCalledWith('http://localhost:3000/pets?status=available&limit=10', {
            method: 'GET',
            headers,
        });
        expect(pets).toHaveLength(1);
        expect(pets[0]).toBeInstanceOf(Pet);
        expect(pets[0].tags[0]).toBeInstanceOf(Tag);
        expect(pets[0].name).toBe('Rex');
    });

    it('should apply the default limit', async () => {
        mockFetch.mockResolvedValueOnce(jsonResponse(200, []));

        await client.listPets();

        expect(mockFetch.mock.calls[0][0]).toBe('http://localhost:3000/pets?limit=50');
    });

    it('should post a new pet as the JSON body', async () => {
        mockFetch.mockResolvedValueOnce(jsonResponse(201, rexJson, 'Created'));
        const newPet = Object.assign(new NewPet(), { name: 'Rex', tags: [tag(1, 'dog')] });

        const pet = await client.addPet(newPet);

        expect(mockFetch).toHaveBeenCalledWith('http://localhost:3000/pets', {
            method: 'POST',
            headers: jsonHeaders,
            body: '{"name":"Rex","status":"available","tags":[{"id":1,"name":"dog"}]}',
        });
        expect(pet.id).toBe(3);
    });

    it('should replace a pet with PUT', async () => {
        mockFetch.mockResolvedValueOnce(jsonResponse(200, { ...rexJson, status: 'pending' }));
        const replacement = Object.assign(new NewPet(), { name: 'Rex', status: 'pending' });

        const pet = await client.updatePet(3, replacement);

        expect(mockFetch).toHaveBeenCalledWith('http://localhost:3000/pets/3', {
            method: 'PUT',
            headers: jsonHeaders,
            body: '{"name":"Rex","status":"pending","tags":[]}',
        });
        expect(pet.status).toBe('pending');
    });

    it('should send only the changed fields with PATCH', async () => {
        mockFetch.mockResolvedValueOnce(jsonResponse(200, { ...rexJson, name: 'Max' }));
        const changes = Object.assign(new PetChanges(), { name: 'Max' });

        const pet = await client.renamePet(3, changes);

        expect(mockFetch).toHaveBeenCalledWith('http://localhost:3000/pets/3', {
            method: 'PATCH',
            headers: jsonHeaders,
            body: '{"name":"Max"}',
        });
        expect(pet.name).toBe('Max');
    });

    it('should send a typed array body', async () => {
        mockFetch.mockResolvedValueOnce(jsonResponse(200, { ...rexJson, tags: [{ id: 2, name: 'cat' }] }));

        await client.replaceTags(3, [tag(2, 'cat')]);

        expect(mockFetch).toHaveBeenCalledWith('http://localhost:3000/pets/3/tags', {
            method: 'PUT',
            headers: jsonHeaders,
            body: '[{"id":2,"name":"cat"}]',
        });
    });

    it('should delete a pet and return the raw JSON', async () => {
        mockFetch.mockResolvedValueOnce(jsonResponse(200, { deleted: 3 }));

        await expect(client.deletePet(3)).resolves.toEqual({ deleted: 3 });
        expect(mockFetch).toHaveBeenCalledWith('http://localhost:3000/pets/3', { method: 'DELETE', headers });
    });

    it('should raise PetInUseError for a 409 on DELETE only', async () => {
        mockFetch
            .mockResolvedValueOnce(jsonResponse(409, {}, 'Conflict'))
            .mockResolvedValueOnce(jsonResponse(409, {}, 'Conflict'));

        await expect(client.deletePet(3, 'sold out')).rejects.toThrow(
            new PetInUseError('Pet at http://localhost:3000/pets/3?reason=sold+out still has open orders'),
        );

        const error: unknown = await client.getPet(3).catch((err: unknown) => err);
        expect(error).toBeInstanceOf(ApiError);
        expect(error).not.toBeInstanceOf(PetInUseError);
        expect(error).toMatchObject({ message: 'HTTP 409: Conflict', statusCode: 409 });
    });

    it('should raise UnauthorizedError for a 401 on any verb', async () => {
        mockFetch.mockResolvedValueOnce(jsonResponse(401, {}, 'Unauthorized'));

        await expect(client.getPet(3)).rejects.toThrow(new UnauthorizedError('HTTP 401: Unauthorized'));
    });

    it('should raise NotFoundError for an unknown pet', async () => {
        mockFetch.mockResolvedValueOnce(jsonResponse(404, { message: 'no such pet' }, 'Not Found'));

        await expect(client.getPet(99)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should wrap connection failures', async () => {
        mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

        const error: unknown = await client.getPet(3).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(ApiError);
        expect(error).toMatchObject({ message: 'RequestException' });
    });

    it('should validate the body before sending it', async () => {
        const invalid = Object.assign(new NewPet(), { name: '' });

        await expect(client.addPet(invalid)).rejects.toBeInstanceOf(SerializationError);
        expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should reject a response that does not match Pet', async () => {
        mockFetch.mockResolvedValueOnce(jsonResponse(200, { ...rexJson, status: 'lost' }));

        await expect(client.getPet(3)).rejects.toThrow(SerializationError);
    });
});
