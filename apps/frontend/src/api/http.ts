import axios, { AxiosError, type InternalAxiosRequestConfig } from "axios";

type AuthHandlers = {
  getAccessToken: () => string | null;
  refreshAccessToken: () => Promise<string | null>;
  onUnauthorized: () => void | Promise<void>;
};

let handlers: AuthHandlers = {
  getAccessToken: () => null,
  refreshAccessToken: async () => null,
  onUnauthorized: async () => undefined
};

const retried = new WeakSet<InternalAxiosRequestConfig>();

export const apiClient = axios.create({
  baseURL: import.meta.env.VITE_API_BASE_URL ?? "http://localhost:4000/api"
});

apiClient.interceptors.request.use((config) => {
  const token = handlers.getAccessToken();
  if (token) {
    config.headers.set("authorization", `Bearer ${token}`);
  }
  return config;
});

apiClient.interceptors.response.use(
  (response) => response,
  async (error: AxiosError) => {
    const original = error.config;
    if (error.response?.status !== 401 || !original || retried.has(original)) {
      throw error;
    }

    retried.add(original);
    const token = await handlers.refreshAccessToken();
    if (!token) {
      await handlers.onUnauthorized();
      throw error;
    }
    return apiClient.request(original);
  }
);

export const configureHttpAuthHandlers = (nextHandlers: AuthHandlers) => {
  handlers = nextHandlers;
};

export const apiErrorMessage = (error: unknown, fallback: string) => {
  if (error instanceof AxiosError) {
    const data: unknown = error.response?.data;
    if (typeof data === "object" && data !== null && "message" in data && typeof data.message === "string") {
      return data.message;
    }
    if (!error.response) {
      return "Could not reach the server. Check your connection and retry.";
    }
  }
  return error instanceof Error && error.message ? error.message : fallback;
};

export const isHttpStatus = (error: unknown, status: number) =>
  error instanceof AxiosError && error.response?.status === status;

/** No answer at all, or a server-side failure. Client errors such as 400 or 401 are real answers. */
export const isServerUnreachable = (error: unknown) =>
  error instanceof AxiosError && (!error.response || error.response.status >= 500);
