import { Module } from '@nestjs/common'
import { BackendService } from './backend.service'
import { BACKEND_GATEWAY } from './backend.types'

@Module({
	providers: [BackendService, { provide: BACKEND_GATEWAY, useExisting: BackendService }],
	exports: [BACKEND_GATEWAY]
})
export class BackendModule {}
