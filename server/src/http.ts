
// Fetch with exponential backoff on 429 / 5xx and network errors.
// Other non-OK responses are returned to the caller untouched.
export const fetchWithRetry = async (
    url: string,
    retries = 3,
    delay = 1000,
    init?: RequestInit
): Promise<Response> => {
    for (let i = 0; i < retries; i++) {
        try {
            const res = await fetch(url, init);
            if (res.status === 429 || res.status >= 500) {
                throw new Error(`HTTP ${res.status}`);
            }
            return res;
        } catch (err) {
            if (i === retries - 1) throw err;
            await new Promise(r => setTimeout(r, delay * Math.pow(2, i)));
        }
    }
    throw new Error('Max retries reached');
};
