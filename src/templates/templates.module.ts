import { Module } from '@nestjs/common';
import { CommandTemplateService } from './command-template.service';

@Module({
  providers: [CommandTemplateService],
  exports: [CommandTemplateService],
})
export class TemplatesModule {}
