/**
 * Request payloads sent to Jenkins.
 */

/** Build parameters; booleans are sent as "true"/"false". */
export type TriggerBuildParams = Record<string, string | boolean>;

/** A local file posted as a file parameter of the build. */
export type BuildArtifact = {
  path: string;
  fileName: string;
  fieldName: string;
};
