import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { ConfigService } from '@nestjs/config'
import { AppModule } from './app.module'

async function bootstrap() {
	const app = await NestFactory.create(AppModule)
	app.enableShutdownHooks()

	const config = app.get(ConfigService)
	const port = config.getOrThrow<number>('PORT')
	await app.listen(port)
	new Logger('Bootstrap').log(`Listening on port ${port}`)
}
void bootstrap()
