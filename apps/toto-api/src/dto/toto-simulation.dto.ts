import { IsInt, IsOptional, Min } from "class-validator";
import { TotoDrawDto } from "./toto-draw.dto";

export class TotoSimulationDto extends TotoDrawDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  maxDraws?: number;
}
