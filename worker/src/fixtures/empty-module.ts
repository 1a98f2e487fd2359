export const notWorkflows = 1;
