export { Header } from './Header.tsx';
export { ReplyDetails } from './ReplyDetails.tsx';
export { DecodeApp, type DecodeAppProps } from './DecodeApp.tsx';
