import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import { GridTwinServicesModule } from "./gridtwin-services.module";
import { StorageModule } from "./storage/storage.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [".env", "../.env"],
      cache: true,
    }),
    StorageModule,
    GridTwinServicesModule,
  ],
})
export class AppModule {
}
