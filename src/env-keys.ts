export const ENV_KEYS = {
  JENKINS_URL: "JENKINS_URL",
  JENKINS_USER: "JENKINS_USER",
  JENKINS_API_TOKEN: "JENKINS_API_TOKEN",
  JENKINS_USE_CRUMB: "JENKINS_USE_CRUMB",
  JENKINS_DEBUG: "JENKINS_DEBUG",
  JENKINS_RESOLVE_STRATEGY: "JENKINS_RESOLVE_STRATEGY",
} as const;
