import { silentLog } from "../core/log.js";
import type { XmlStreamOptions } from "../core/options.js";
import type { ConnectionInfo, WriteLine } from "../core/types.js";
import { BootstrapMixin } from "../dispatch/bootstrap.js";
import type { Dispatcher } from "../dispatch/event-dispatcher.js";
import { XmlStream } from "./xml-stream.js";

/** A protocol a factory can build: dispatcher-capable, with a factory slot. */
export interface FactoryProtocol extends Dispatcher {
  factory: BootstrapMixin | null;
}

export type ProtocolClass<P extends FactoryProtocol, A extends unknown[]> = new (...args: A) => P;

const describeConnection = (connection: ConnectionInfo | null): string => {
  if (!connection?.remoteAddress) {
    return "NONE";
  }
  return connection.remotePort === undefined
    ? connection.remoteAddress
    : `${connection.remoteAddress}:${connection.remotePort}`;
};

/**
 * Builds one protocol instance per connection from a protocol class and the
 * arguments captured at construction, then installs the bootstraps on it.
 */
export class ProtocolFactory<P extends FactoryProtocol, A extends unknown[]> extends BootstrapMixin {
  protocol: ProtocolClass<P, A>;
  readonly args: A;
  log: WriteLine = silentLog;

  constructor(protocol: ProtocolClass<P, A>, ...args: A) {
    super();
    this.protocol = protocol;
    this.args = args;
  }

  buildProtocol(connection: ConnectionInfo | null = null): P {
    const instance = new this.protocol(...this.args);
    instance.factory = this;
    this.installBootstraps(instance);
    this.log(`PROTOCOL_BUILT:${describeConnection(connection)}`);
    return instance;
  }
}

export class XmlStreamFactory extends ProtocolFactory<XmlStream, [XmlStreamOptions?]> {
  constructor(options?: XmlStreamOptions) {
    super(XmlStream, options);
    this.log = options?.log ?? silentLog;
  }
}
