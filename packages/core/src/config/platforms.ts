/**
 * Deployment platform catalogue
 */

import { z } from "zod"
import { DEPLOYMENT_PLATFORMS } from "../blueprint/schema"
import type { DeploymentPlatform } from "../blueprint/types"
import catalogue from "./platforms.json"

const ServiceListSchema = z.array(z.string()).min(1)

const PlatformServicesSchema = z.object({
	name: z.string(),
	services: z.object({
		compute: ServiceListSchema,
		database: ServiceListSchema,
		storage: ServiceListSchema,
		cdn: ServiceListSchema,
		loadBalancer: ServiceListSchema,
		cache: ServiceListSchema,
		monitoring: ServiceListSchema,
		ciCd: ServiceListSchema,
		secrets: ServiceListSchema,
		networking: ServiceListSchema,
	}),
	recommended: z.object({
		compute: z.string(),
		database: z.string(),
		storage: z.string(),
		cdn: z.string(),
		monitoring: z.string(),
	}),
})

export type PlatformServices = z.infer<typeof PlatformServicesSchema>

/** Every platform except "other" has an entry */
export type KnownPlatform = Exclude<DeploymentPlatform, "other">

const PLATFORM_SERVICES = z
	.record(PlatformServicesSchema)
	.parse(catalogue)

export function isKnownPlatform(value: string): value is KnownPlatform {
	return value !== "other" && Object.hasOwn(PLATFORM_SERVICES, value)
}

export function getPlatformServices(
	platform: string,
): PlatformServices | undefined {
	return isKnownPlatform(platform) ? PLATFORM_SERVICES[platform] : undefined
}

export function listPlatforms(): Array<{
	id: DeploymentPlatform
	services?: PlatformServices
}> {
	return DEPLOYMENT_PLATFORMS.map((id) => ({
		id,
		services: getPlatformServices(id),
	}))
}

/**
 * Format a platform's recommended services as prompt lines
 */
export function formatRecommendedServices(platform: string): string {
	const info = getPlatformServices(platform)
	if (!info) return ""
	const { recommended } = info
	return [
		`Recommended services for ${info.name}:`,
		`- Compute: ${recommended.compute}`,
		`- Database: ${recommended.database}`,
		`- Storage: ${recommended.storage}`,
		`- CDN: ${recommended.cdn}`,
		`- Monitoring: ${recommended.monitoring}`,
	].join("\n")
}
