import { Controller, Get, Query } from '@nestjs/common';
import { ScanQueryDto, ScanReport } from './scan.dto';
import { ScanService } from './scan.service';

@Controller('scan')
export class ScanController {
  constructor(private readonly scanService: ScanService) {}

  /**
   * Rank all hiking spots by their best upcoming sunrise or sunset
   */
  @Get()
  async scan(@Query() query: ScanQueryDto): Promise<ScanReport> {
    return this.scanService.scan(query.type);
  }
}
