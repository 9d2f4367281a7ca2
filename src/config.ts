// Upper bound for either image side; BIF6 stores dimensions as uint16, but
// anything beyond this is treated as a corrupt header.
export const MaxImageDimension = 8192;

export const Bif6FileExtension = '.bif6';
