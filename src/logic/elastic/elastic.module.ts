import { Module } from '@nestjs/common';
import { ElasticService } from './elastic.service';

// ConfigModule is global, ElasticService reads ELASTIC_URL / ELASTIC_API_KEY from it
@Module({
    providers: [ElasticService],
    exports: [ElasticService],
})
export class ElasticModule {}
