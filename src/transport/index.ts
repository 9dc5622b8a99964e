export * from "./Downloader";
export * from "./FtpTransport";
export * from "./HttpTransport";
export * from "./SftpTransport";
export * from "./types";
