import 'open-props/style';
import './styles/tokens.css';
import { appConfig } from './config';
import { MountTargetError, mountRoot } from './mountRoot';

const container = document.getElementById(appConfig.mountElementId);
if (!container) throw new MountTargetError(appConfig.mountElementId);

mountRoot(container);
