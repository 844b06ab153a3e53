import { Transform } from 'class-transformer';
import { IsArray, IsIn, IsInt, IsNotEmpty, IsString } from 'class-validator';
import { StaffPosition, StaffSkill } from '@ticket-dispatch/shared-models';

export const STAFF_POSITIONS: StaffPosition[] = ['SPECIALIST', 'SENIOR_SPECIALIST', 'CHIEF_SPECIALIST'];

export const STAFF_SKILLS: StaffSkill[] = ['VIP', 'KZ', 'ENG'];

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);

/**
 * Roster row as handed over by the persistence layer.
 * Load sign and facility membership are checked per ticket, not here.
 */
export class StaffRecordDto {
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  fullName!: string;

  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  facility!: string;

  @IsIn(STAFF_POSITIONS)
  position!: StaffPosition;

  @Transform(({ value }) =>
    Array.isArray(value)
      ? value.map((skill: unknown) => (typeof skill === 'string' ? skill.trim().toUpperCase() : skill))
      : value
  )
  @IsArray()
  @IsIn(STAFF_SKILLS, { each: true })
  skills!: StaffSkill[];

  @IsInt()
  currentLoad!: number;
}
