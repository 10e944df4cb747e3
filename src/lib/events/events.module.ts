import { Global, Module, OnApplicationShutdown } from '@nestjs/common';
import { AppEvents } from './events.service';

@Global()
@Module({
  providers: [AppEvents],
  exports: [AppEvents],
})
export class EventsModule implements OnApplicationShutdown {
  constructor(private readonly events: AppEvents) {}

  onApplicationShutdown() {
    this.events.removeAllListeners();
  }
}
