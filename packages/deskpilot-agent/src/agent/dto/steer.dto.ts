import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class SteerDto {
  @IsNotEmpty()
  @IsString()
  @MaxLength(2000)
  text!: string;
}
