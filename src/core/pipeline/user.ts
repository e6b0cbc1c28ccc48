import { fetchData } from "./fetch";
import type { FetchOptions, ProcessedUserRecord, UserRecord } from "./types/core";

/**
 * Fetches user data
 */
export async function fetchUser(id: number, options: FetchOptions = {}): Promise<ProcessedUserRecord> {
	const data = await fetchData(`/users/${id}`, options);
	return processUserData(data);
}

export function processUserData(data: UserRecord): ProcessedUserRecord {
	return {
		...data,
		processed: true,
	};
}

export async function checkValidation(user: UserRecord | null | undefined): Promise<boolean> {
	return user !== null && user !== undefined;
}

export const validateUser = async (user: UserRecord | null | undefined): Promise<boolean> => {
	const isValid = await checkValidation(user);
	return isValid;
};
