import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { AdaptResponse, AdaptService } from './adapt.service';
import { AdaptRequestDto } from './dto/adapt-request.dto';

@Controller('adapt')
export class AdaptController {
  constructor(private readonly adaptService: AdaptService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  adapt(@Body() dto: AdaptRequestDto): Promise<AdaptResponse> {
    return this.adaptService.adapt(dto);
  }
}
