import {
  Body,
  Controller,
  Get,
  Param,
  ParseUUIDPipe,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ValidationError } from '../common/errors';
import { decodeOriginalName } from '../documents/documents.controller';
import { CreateProjectDto, GenerateSectionDto } from './dto';
import { ProjectsService } from './projects.service';

@Controller('projects')
export class ProjectsController {
  constructor(private readonly projectsService: ProjectsService) {}

  @Post()
  create(@Body() createProjectDto: CreateProjectDto) {
    return this.projectsService.create(createProjectDto.name);
  }

  @Get(':id')
  findOne(@Param('id', ParseUUIDPipe) id: string) {
    return this.projectsService.findOne(id);
  }

  @Post(':id/rc')
  @UseInterceptors(FileInterceptor('file'))
  attachRc(
    @Param('id', ParseUUIDPipe) id: string,
    @UploadedFile() file: Express.Multer.File | undefined,
  ) {
    if (!file) {
      throw new ValidationError('A file is required in the "file" field');
    }

    return this.projectsService.attachRc(
      id,
      decodeOriginalName(file.originalname),
      file.buffer,
    );
  }

  @Post(':id/sections')
  generateSection(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() generateSectionDto: GenerateSectionDto,
  ) {
    const { sectionType, ...options } = generateSectionDto;
    return this.projectsService.generateSection(id, sectionType, options);
  }

  @Get(':id/sections')
  listSections(@Param('id', ParseUUIDPipe) id: string) {
    return this.projectsService.listSections(id);
  }
}
