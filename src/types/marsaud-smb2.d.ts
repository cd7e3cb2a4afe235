declare module "@marsaud/smb2" {
  namespace SMB2 {
    interface Options {
      /** UNC share path, `\\\\host\\share` */
      share: string;
      domain: string;
      username: string;
      password: string;
      port?: number;
    }

    interface Stats {
      size: number;
    }
  }

  class SMB2 {
    constructor(options: SMB2.Options);
    exists(path: string): Promise<boolean>;
    mkdir(path: string): Promise<void>;
    readdir(path: string): Promise<string[]>;
    stat(path: string): Promise<SMB2.Stats>;
    writeFile(path: string, data: Buffer): Promise<void>;
    rename(oldPath: string, newPath: string): Promise<void>;
    unlink(path: string): Promise<void>;
    disconnect(): void;
  }

  export = SMB2;
}
