import { Body, Controller, Inject, Post } from "@nestjs/common";
import { TotoService } from "./toto.service";
import { TotoDrawDto } from "./dto/toto-draw.dto";
import { TotoSimulationDto } from "./dto/toto-simulation.dto";
import type { TotoDrawResponse, TotoSimulationResponse } from "./dto/toto-response.dto";
import { ValidateBodyPipe } from "./validate-body.pipe";

@Controller("toto")
export class TotoController {
  constructor(@Inject(TotoService) private readonly totoService: TotoService) {}

  @Post("draw")
  draw(@Body(new ValidateBodyPipe(TotoDrawDto)) dto: TotoDrawDto): TotoDrawResponse {
    return this.totoService.draw(dto);
  }

  @Post("simulate")
  simulate(@Body(new ValidateBodyPipe(TotoSimulationDto)) dto: TotoSimulationDto): TotoSimulationResponse {
    return this.totoService.simulate(dto);
  }
}
