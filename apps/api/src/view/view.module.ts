import { Module } from '@nestjs/common';
import { AcquisitionModule } from '../acquisition/acquisition.module';
import { ViewController } from './view.controller';
import { ViewService } from './view.service';

@Module({
  imports: [AcquisitionModule],
  controllers: [ViewController],
  providers: [ViewService],
})
export class ViewModule {}
