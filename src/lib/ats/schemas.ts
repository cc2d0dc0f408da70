// ---------------------------------------------------------------------------
// ATS REST API — Zod Validation Schemas
// ---------------------------------------------------------------------------

import { z } from "zod";

// --- Authentication ---

export const LoginInfoResponseSchema = z.object({
	oauthUrl: z.string().url(),
	restUrl: z.string().url(),
});

export const TokenResponseSchema = z.object({
	access_token: z.string().min(1),
	refresh_token: z.string().optional(),
	expires_in: z.number().optional(),
});

export const RestLoginResponseSchema = z.object({
	BhRestToken: z.string().min(1),
	restUrl: z.string().url().optional(),
});

// --- Job orders ---

const PersonSchema = z
	.object({
		name: z.string().nullish(),
		firstName: z.string().nullish(),
		lastName: z.string().nullish(),
	})
	.passthrough();

export const RawJobSchema = z
	.object({
		id: z.union([z.number().int(), z.string().min(1)]),
		title: z.string().nullish(),
		isOpen: z.boolean().nullish(),
		isDeleted: z.boolean().nullish(),
		status: z.string().nullish(),
		dateAdded: z.number().nullish(),
		dateLastModified: z.number().nullish(),
		publicDescription: z.string().nullish(),
		description: z.string().nullish(),
		address: z
			.object({
				city: z.string().nullish(),
				state: z.string().nullish(),
				countryName: z.string().nullish(),
			})
			.passthrough()
			.nullish(),
		employmentType: z.string().nullish(),
		onSite: z.union([z.string(), z.array(z.string())]).nullish(),
		assignments: z
			.object({ data: z.array(z.object({ primaryRecruiter: PersonSchema.nullish() }).passthrough()) })
			.nullish(),
		assignedUsers: z.object({ data: z.array(PersonSchema) }).nullish(),
		responseUser: PersonSchema.nullish(),
		owner: PersonSchema.nullish(),
	})
	.passthrough();

export type RawJob = z.infer<typeof RawJobSchema>;

/**
 * Items stay `unknown` at page level so one malformed job order does not
 * discard the page; each item is validated by the record mapper.
 */
export const SearchPageSchema = z.object({
	total: z.number().int().nonnegative().optional(),
	start: z.number().int().nonnegative().optional(),
	count: z.number().int().nonnegative().optional(),
	data: z.array(z.unknown()),
});

/** `entity/Tearsheet/{id}?fields=jobOrders(...)`: first page of members plus the member total. */
export const TearsheetEntitySchema = z.object({
	data: z.object({
		id: z.union([z.number(), z.string()]).optional(),
		name: z.string().nullish(),
		jobOrders: z.object({
			total: z.number().int().nonnegative(),
			data: z.array(z.unknown()),
		}),
	}),
});

/** `entity/Tearsheet/{id}/jobOrders?start=&count=`: one page of member ids. */
export const AssociationPageSchema = z.object({
	total: z.number().int().nonnegative().optional(),
	data: z.array(z.object({ id: z.union([z.number().int(), z.string().min(1)]) }).passthrough()),
});

export type SearchPage = z.infer<typeof SearchPageSchema>;
export type TearsheetEntity = z.infer<typeof TearsheetEntitySchema>;
export type AssociationPage = z.infer<typeof AssociationPageSchema>;
