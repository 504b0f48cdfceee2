import 'reflect-metadata';
import { Type } from 'class-transformer';
import { IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Min, ValidateNested } from 'class-validator';

export const PET_STATUSES = ['available', 'pending', 'sold'] as const;

export type PetStatus = (typeof PET_STATUSES)[number];

/**
 * Tag DTO.
 */
export class Tag {
    @IsInt()
    id: number = 0;

    @IsString()
    @IsNotEmpty()
    name: string = '';
}

/**
 * Pet as the store returns it.
 */
export class Pet {
    @IsInt()
    @Min(1)
    id: number = 0;

    @IsString()
    @IsNotEmpty()
    name: string = '';

    @IsIn([...PET_STATUSES])
    status: PetStatus = 'available';

    @ValidateNested({ each: true })
    @Type(() => Tag)
    tags: Tag[] = [];

    @IsString()
    @IsOptional()
    photoUrl?: string;
}

/**
 * Body of addPet; the store assigns the id.
 */
export class NewPet {
    @IsString()
    @IsNotEmpty()
    name: string = '';

    @IsIn([...PET_STATUSES])
    status: PetStatus = 'available';

    @ValidateNested({ each: true })
    @Type(() => Tag)
    tags: Tag[] = [];
}

/**
 * Partial update for renamePet; absent fields are left alone.
 */
export class PetChanges {
    @IsString()
    @IsNotEmpty()
    @IsOptional()
    name?: string;

    @IsIn([...PET_STATUSES])
    @IsOptional()
    status?: PetStatus;
}
