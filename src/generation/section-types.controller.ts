import { Controller, Get } from '@nestjs/common';
import { listSectionTypes } from './section-types';

@Controller('section-types')
export class SectionTypesController {
  @Get()
  findAll() {
    return listSectionTypes();
  }
}
