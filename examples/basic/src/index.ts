import { EnumSet } from "@enumset/core";
import { createLogger, deriveOrdinal } from "@enumset/derive";

const PERMISSIONS = ["Read", "Write", "Execute", "Admin"] as const;
type Permission = (typeof PERMISSIONS)[number];

const PermissionOrdinal = deriveOrdinal("Permission", PERMISSIONS);

const log = createLogger({
  name: "example",
  level: "info",
  json: false,
  pretty: false,
});

const user = EnumSet.of(PermissionOrdinal, "Read", "Write");
const script = EnumSet.of<Permission>(PermissionOrdinal, "Read", "Execute");

log.info(`user ${user}`, { bits: user.bits });
log.info(`script ${script}`, { bits: script.bits });
log.info(`granted ${user.intersection(script)}`);
log.info(`missing ${script.difference(user)}`);
log.info(`user may run script: ${user.isSuperset(script)}`);
