import { ArrayMaxSize, ArrayMinSize, ArrayUnique, IsArray, IsInt, IsOptional, IsString, Max, MaxLength, Min } from "class-validator";

export class TotoDrawDto {
  @IsArray()
  @ArrayMinSize(6)
  @ArrayMaxSize(6)
  @ArrayUnique({ message: "numbers must be unique" })
  @IsInt({ each: true })
  @Min(1, { each: true })
  @Max(49, { each: true })
  numbers!: number[];

  @IsOptional()
  @IsString()
  @MaxLength(64)
  clientSeed?: string;
}
