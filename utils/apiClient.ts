// utils/apiClient.ts
import axios from 'axios';
import logger from './logger';
import config from './config';

const apiClient = axios.create({
    timeout: config.ai.timeoutMs,
    headers: {
        'User-Agent': 'DispatchDesk/1.0',
        'Accept': 'application/json',
        'Content-Type': 'application/json',
    },
});

apiClient.interceptors.response.use(
    (response) => response,
    (error: unknown) => {
        if (axios.isAxiosError(error) && error.code === 'ECONNABORTED') {
            logger.warn(`⚠️ Request timed out: ${error.config?.url ?? 'unknown url'}`);
        }
        return Promise.reject(error);
    }
);

export default apiClient;
