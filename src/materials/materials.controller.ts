import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { MaterialsService } from './materials.service';
import { CreateMaterialDto } from './dto/create-material.dto';

@Controller('materials')
export class MaterialsController {
  constructor(private readonly materialsService: MaterialsService) {}

  @Post()
  create(@Body() dto: CreateMaterialDto) {
    return this.materialsService.create(dto);
  }

  @Get(':user_id')
  list(@Param('user_id') userId: string) {
    return this.materialsService.listForUser(userId);
  }
}
